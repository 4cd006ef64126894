import { CORRECTIVE_PROMPT, MAX_TURN_BUDGET, formatObservationPrompt, parseAction } from "./actions";
import type { Action } from "./actions";
import { ChatSession, generationOptionsFrom } from "./chat";
import type { ChatBackend, ChatMessage, GenerationOptions } from "./chat";
import type { AgentConfig } from "./config";
import { TurnBudgetError } from "./errors";
import { assemblePrompt, renderInitialPrompt } from "./prompts";
import { ReActSession } from "./session";
import { createToolTable, dispatch } from "./tools";
import type { Summarizer, ToolTable } from "./tools";
import type { KnowledgeSource } from "./wikipedia";

export interface AgentDependencies {
  backend: ChatBackend;
  knowledge: KnowledgeSource;
  prompt?: string;
  summarizer?: Summarizer;
}

export interface RunOptions {
  maxTurns?: number;
  debug?: boolean;
  streamObserver?: AgentStreamObserver;
}

export interface RunResult {
  answer?: string;
  finished: boolean;
  turns: number;
  sources: string[];
  transcript?: string[];
}

export type AgentStreamEvent =
  | {
      type: "turn_started";
      turn: number;
    }
  | {
      type: "message_chunk";
      turn: number;
      chunk: string;
    }
  | {
      type: "message_completed";
      turn: number;
      content: string;
    }
  | {
      type: "action";
      turn: number;
      action: Action;
    }
  | {
      type: "parse_failed";
      turn: number;
      reply: string;
    }
  | {
      type: "observation";
      turn: number;
      action: Action;
      observation: string;
    }
  | {
      type: "source_recorded";
      turn: number;
      topic: string;
      url: string;
    }
  | {
      type: "run_completed";
      answer?: string;
      finished: boolean;
      turns: number;
      sources: string[];
    };

export type AgentStreamObserver = (event: AgentStreamEvent) => void | Promise<void>;

export function validateTurnBudget(budget: number): number {
  if (!Number.isInteger(budget) || budget <= 0 || budget > MAX_TURN_BUDGET) {
    throw new TurnBudgetError(budget);
  }
  return budget;
}

export class ReActAgent {
  private readonly chat: ChatSession;
  private readonly generation: GenerationOptions;
  private readonly state = new ReActSession();
  private readonly tools: ToolTable;
  private readonly prompt: string;

  constructor(
    private readonly config: AgentConfig,
    deps: AgentDependencies,
  ) {
    this.chat = new ChatSession(deps.backend);
    this.generation = generationOptionsFrom(config);
    this.tools = createToolTable({
      knowledge: deps.knowledge,
      lookupWindow: config.lookupWindow,
      summarizer: deps.summarizer,
    });
    this.prompt = deps.prompt ?? assemblePrompt();
  }

  get session(): ReActSession {
    return this.state;
  }

  get history(): readonly ChatMessage[] {
    return this.chat.history;
  }

  async run(question: string, options: RunOptions = {}): Promise<RunResult> {
    const maxTurns = validateTurnBudget(options.maxTurns ?? this.config.maxTurns);
    const observer = options.streamObserver;
    const captureDebug = Boolean(options.debug);
    const transcript: string[] = [];

    this.state.resume();
    // Follow-up questions reuse the conversation, so the few-shot prompt is only sent once.
    let nextPrompt = this.chat.history.length ? question : renderInitialPrompt(this.prompt, question);
    let turns = 0;

    for (let turn = 1; turn <= maxTurns; turn += 1) {
      turns = turn;
      await observer?.({ type: "turn_started", turn });
      const reply = await this.chat.send(nextPrompt, this.generation, async (chunk) => {
        await observer?.({ type: "message_chunk", turn, chunk });
      });
      await observer?.({ type: "message_completed", turn, content: reply });
      if (captureDebug && reply.trim()) {
        transcript.push(`Turn ${turn} reply:\n${reply.trim()}`);
      }

      const action = parseAction(reply);
      if (!action) {
        await observer?.({ type: "parse_failed", turn, reply });
        if (captureDebug) {
          transcript.push(`Turn ${turn}: no action found, sending corrective prompt`);
        }
        nextPrompt = CORRECTIVE_PROMPT;
        continue;
      }

      await observer?.({ type: "action", turn, action });
      const knownSources = this.state.sources.length;
      const observation = await dispatch(this.tools, action, this.state);
      for (let index = knownSources; index < this.state.sources.length; index += 1) {
        await observer?.({
          type: "source_recorded",
          turn,
          topic: this.state.searchHistory[index],
          url: this.state.sources[index],
        });
      }
      await observer?.({ type: "observation", turn, action, observation });
      if (captureDebug) {
        transcript.push(`Turn ${turn} ${action.kind}(${action.argument}):\n${summarizeObservation(observation)}`);
      }

      if (!this.state.shouldContinue) {
        break;
      }
      nextPrompt = formatObservationPrompt(action, observation, turn);
    }

    const result: RunResult = {
      answer: this.state.answer,
      finished: !this.state.shouldContinue,
      turns,
      sources: [...this.state.sources],
    };
    await observer?.({ type: "run_completed", ...result });
    if (captureDebug) {
      return { ...result, transcript };
    }
    return result;
  }

  reset(): void {
    this.chat.clear();
    this.state.reset();
  }
}

function summarizeObservation(content: string): string {
  const limit = 1200;
  if (content.length <= limit) {
    return content;
  }
  return `${content.slice(0, limit)}\n... (truncated)`;
}
