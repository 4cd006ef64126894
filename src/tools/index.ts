import type { Action } from "../actions";
import type { ReActSession } from "../session";
import type { KnowledgeSource } from "../wikipedia";
import { createFinishTool } from "./finish";
import { createLookupTool } from "./lookup";
import { createSearchTool } from "./search";
import type { Summarizer, ToolTable } from "./types";

export { createFinishTool } from "./finish";
export { createLookupTool, extractPassage } from "./lookup";
export { createSearchTool, formatMissingTopic } from "./search";
export type { Summarizer, ToolHandler, ToolTable } from "./types";

export interface ToolDependencies {
  knowledge: KnowledgeSource;
  lookupWindow?: number;
  summarizer?: Summarizer;
}

export function createToolTable(deps: ToolDependencies): ToolTable {
  return {
    search: createSearchTool({
      knowledge: deps.knowledge,
      summarizer: deps.summarizer,
    }),
    lookup: createLookupTool({ knowledge: deps.knowledge, window: deps.lookupWindow }),
    finish: createFinishTool(),
  };
}

export function dispatch(table: ToolTable, action: Action, session: ReActSession): Promise<string> {
  switch (action.kind) {
    case "search":
      return table.search.call(action.argument, session);
    case "lookup":
      return table.lookup.call(action.argument, session);
    case "finish":
      return table.finish.call(action.argument, session);
  }
}
