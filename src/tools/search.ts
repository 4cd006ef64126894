import { DisambiguationError, isMissingTopicError } from "../errors";
import { collapseWhitespace, type KnowledgeSource } from "../wikipedia";
import type { Summarizer, ToolHandler } from "./types";

export interface SearchToolOptions {
  knowledge: KnowledgeSource;
  summarizer?: Summarizer;
}

export function formatMissingTopic(topic: string, candidates: readonly string[]): string {
  const similar = candidates.map((candidate) => `'${candidate}'`).join(", ");
  return `Could not find ["${topic}"]. Similar: [${similar}]. You should search for one of those instead.`;
}

export function createSearchTool(options: SearchToolOptions): ToolHandler<"search"> {
  const { knowledge, summarizer } = options;
  return {
    kind: "search",
    async call(argument, session) {
      const topic = argument.trim();
      try {
        const summary = await knowledge.summary(topic);
        const { url } = await knowledge.page(topic);
        const extract = collapseWhitespace(summary);
        const observation = summarizer ? collapseWhitespace(await summarizer.summarize(extract)) : extract;
        session.recordSearch(topic, url);
        return observation;
      } catch (error) {
        if (!isMissingTopicError(error)) {
          throw error;
        }
        // Disambiguation pages already list their targets.
        const candidates =
          error instanceof DisambiguationError && error.options.length
            ? error.options
            : await knowledge.search(topic);
        return formatMissingTopic(topic, candidates);
      }
    },
  };
}
