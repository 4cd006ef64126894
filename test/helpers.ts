import type { ChatBackend, ChatMessage, GenerationOptions } from "../src/chat";
import type { AgentConfig } from "../src/config";
import { DisambiguationError, PageNotFoundError } from "../src/errors";
import type { KnowledgeSource, WikiPage } from "../src/wikipedia";

export interface FakeArticle {
  summary: string;
  url: string;
  text: string;
}

export class FakeKnowledge implements KnowledgeSource {
  readonly pageRequests: string[] = [];

  constructor(
    private readonly articles: Record<string, FakeArticle>,
    private readonly candidates: Record<string, string[]> = {},
    private readonly ambiguous: string[] = [],
  ) {}

  async summary(topic: string): Promise<string> {
    return this.article(topic).summary;
  }

  async page(topic: string): Promise<WikiPage> {
    this.pageRequests.push(topic);
    const article = this.article(topic);
    return { title: topic, url: article.url, text: article.text };
  }

  async search(topic: string): Promise<string[]> {
    return this.candidates[topic] ?? [];
  }

  private article(topic: string): FakeArticle {
    if (this.ambiguous.includes(topic)) {
      throw new DisambiguationError(topic);
    }
    const article = this.articles[topic];
    if (!article) {
      throw new PageNotFoundError(topic);
    }
    return article;
  }
}

export interface RecordedCall {
  messages: ChatMessage[];
  options: GenerationOptions;
}

/**
 * Replies with the scripted texts in order and remembers what it was sent.
 */
export class ScriptedBackend implements ChatBackend {
  readonly calls: RecordedCall[] = [];
  private cursor = 0;

  constructor(private readonly replies: string[]) {}

  async complete(messages: readonly ChatMessage[], options: GenerationOptions, onChunk?: (chunk: string) => void | Promise<void>) {
    this.calls.push({ messages: [...messages], options });
    const reply = this.replies[this.cursor] ?? "Thought: I am not sure.";
    this.cursor += 1;
    await onChunk?.(reply);
    return reply;
  }

  lastPrompt(): string | undefined {
    const call = this.calls[this.calls.length - 1];
    return call?.messages[call.messages.length - 1]?.content;
  }
}

export function testConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    apiKey: "test-key",
    model: "test-model",
    baseUrl: "https://example.test/v1",
    temperature: 0.7,
    topP: 1,
    maxTokens: 256,
    maxTurns: 8,
    wikipediaLanguage: "en",
    summarySentences: 4,
    lookupWindow: 10,
    summarizeSearch: false,
    ...overrides,
  };
}
