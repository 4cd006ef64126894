import type { ActionKind } from "../actions";
import type { ReActSession } from "../session";

export interface ToolHandler<Kind extends ActionKind = ActionKind> {
  kind: Kind;
  call: (argument: string, session: ReActSession) => Promise<string>;
}

export type ToolTable = { [Kind in ActionKind]: ToolHandler<Kind> };

/**
 * Condenses a search result before it becomes an observation.
 */
export interface Summarizer {
  summarize(text: string): Promise<string>;
}
