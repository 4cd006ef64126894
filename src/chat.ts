import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";

import { STOP_MARKERS, truncateAtStopMarker } from "./actions";
import type { AgentConfig } from "./config";
import { renderSummarizePrompt } from "./prompts";
import type { Summarizer } from "./tools";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationOptions {
  stop: string[];
  temperature: number;
  topP: number;
  maxTokens: number;
}

export type ChunkCallback = (chunk: string) => void | Promise<void>;

/**
 * Stateless completion endpoint. Implementations return the generated text cut at
 * the first stop marker in `options.stop`.
 */
export interface ChatBackend {
  complete(messages: readonly ChatMessage[], options: GenerationOptions, onChunk?: ChunkCallback): Promise<string>;
}

export function generationOptionsFrom(config: AgentConfig): GenerationOptions {
  return {
    stop: [...STOP_MARKERS],
    temperature: config.temperature,
    topP: config.topP,
    maxTokens: config.maxTokens,
  };
}

/**
 * The two chat-completions calls the backend makes.
 */
export interface CompletionClient {
  stream(params: ChatCompletionCreateParamsStreaming): Promise<AsyncIterable<ChatCompletionChunk>>;
  create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export function createOpenAICompletionClient(config: AgentConfig): CompletionClient {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
  });
  return {
    stream: (params) => client.chat.completions.create(params),
    create: (params) => client.chat.completions.create(params),
  };
}

export class OpenAIChatBackend implements ChatBackend, Summarizer {
  private readonly client: CompletionClient;

  constructor(
    private readonly config: AgentConfig,
    client?: CompletionClient,
  ) {
    this.client = client ?? createOpenAICompletionClient(config);
  }

  async complete(
    messages: readonly ChatMessage[],
    options: GenerationOptions,
    onChunk?: ChunkCallback,
  ): Promise<string> {
    const params = messages.map<ChatCompletionMessageParam>((message) =>
      message.role === "user"
        ? { role: "user", content: message.content }
        : { role: "assistant", content: message.content },
    );
    const stream = await this.client.stream({
      model: this.config.model,
      messages: params,
      temperature: options.temperature,
      top_p: options.topP,
      max_tokens: options.maxTokens,
      stop: options.stop,
      stream: true,
    });
    const text = await collectStream(stream, onChunk);
    return truncateAtStopMarker(text, options.stop);
  }

  async summarize(text: string): Promise<string> {
    const response = await this.client.create({
      model: this.config.model,
      temperature: 0,
      top_p: 1,
      max_tokens: 300,
      messages: [{ role: "user", content: renderSummarizePrompt(text) }],
    });
    return response.choices[0]?.message?.content?.trim() || text;
  }
}

async function collectStream(stream: AsyncIterable<ChatCompletionChunk>, onChunk?: ChunkCallback): Promise<string> {
  let content = "";
  for await (const chunk of stream) {
    for (const choice of chunk.choices) {
      const piece = choice.delta.content;
      if (piece) {
        content += piece;
        await onChunk?.(piece);
      }
    }
  }
  return content;
}

/**
 * A conversation with memory: every `send` is appended to the history together
 * with the model's reply, and the whole history goes out on the next call.
 */
export class ChatSession {
  private readonly messages: ChatMessage[] = [];

  constructor(private readonly backend: ChatBackend) {}

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  async send(content: string, options: GenerationOptions, onChunk?: ChunkCallback): Promise<string> {
    const pending: ChatMessage = { role: "user", content };
    const reply = await this.backend.complete([...this.messages, pending], options, onChunk);
    this.messages.push(pending, { role: "assistant", content: reply });
    return reply;
  }

  clear(): void {
    this.messages.length = 0;
  }
}
