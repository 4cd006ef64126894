import { MAX_TURN_BUDGET } from "./actions";

/**
 * Base class for errors raised by the agent and its knowledge source.
 */
export class ReActAgentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReActAgentError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised before the first model call when a run asks for an unusable turn budget.
 */
export class TurnBudgetError extends ReActAgentError {
  readonly budget: number;

  constructor(budget: number) {
    super(`Turn budget must be an integer between 1 and ${MAX_TURN_BUDGET}, got ${budget}.`);
    this.name = "TurnBudgetError";
    this.budget = budget;
  }
}

export class PageNotFoundError extends ReActAgentError {
  readonly topic: string;

  constructor(topic: string) {
    super(`No Wikipedia page matches "${topic}".`);
    this.name = "PageNotFoundError";
    this.topic = topic;
  }
}

/**
 * The topic resolves to a disambiguation page. `options` lists the titles it links to, when known.
 */
export class DisambiguationError extends ReActAgentError {
  readonly topic: string;
  readonly options: string[];

  constructor(topic: string, options: string[] = []) {
    super(`"${topic}" may refer to several pages.`);
    this.name = "DisambiguationError";
    this.topic = topic;
    this.options = options;
  }
}

export class KnowledgeSourceError extends ReActAgentError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "KnowledgeSourceError";
    this.status = status;
  }
}

export function isMissingTopicError(error: unknown): error is PageNotFoundError | DisambiguationError {
  return error instanceof PageNotFoundError || error instanceof DisambiguationError;
}
