import { collapseWhitespace, type KnowledgeSource } from "../wikipedia";
import type { ToolHandler } from "./types";

export interface LookupToolOptions {
  knowledge: KnowledgeSource;
  window?: number;
}

/**
 * Returns the first match of `phrase` with `window` characters on either side,
 * or "" when the phrase does not occur.
 */
export function extractPassage(text: string, phrase: string, window: number): string {
  const index = text.indexOf(phrase);
  if (!phrase || index === -1) {
    return "";
  }
  return text.slice(Math.max(0, index - window), index + phrase.length + window);
}

export function createLookupTool(options: LookupToolOptions): ToolHandler<"lookup"> {
  const { knowledge } = options;
  const window = options.window ?? 200;
  return {
    kind: "lookup",
    async call(argument, session) {
      const topic = session.lastTopic();
      if (topic === undefined) {
        return "";
      }
      const page = await knowledge.page(topic);
      return collapseWhitespace(extractPassage(page.text, argument.trim(), window));
    },
  };
}
