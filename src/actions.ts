export const MAX_TURN_BUDGET = 8;

export const ACTION_KINDS = ["search", "lookup", "finish"] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export interface Action {
  kind: ActionKind;
  argument: string;
}

export const STOP_MARKERS: string[] = ACTION_KINDS.map((kind) => `</${kind}>`);

export const CORRECTIVE_PROMPT =
  "Please try to generate thought-action-observation traces as instructed by the prompt.";

const OPENING_TAG = new RegExp(`<(${ACTION_KINDS.join("|")})>`, "g");

/**
 * Cuts `text` at the earliest stop marker. Backends that honour stop sequences
 * never return the marker, so text without one comes back unchanged.
 */
export function truncateAtStopMarker(text: string, markers: readonly string[] = STOP_MARKERS): string {
  let cut = text.length;
  for (const marker of markers) {
    const index = text.indexOf(marker);
    if (index !== -1 && index < cut) {
      cut = index;
    }
  }
  return text.slice(0, cut);
}

/**
 * Reads the action out of a model reply: the last recognised opening tag wins
 * and everything after it is the argument.
 */
export function parseAction(reply: string): Action | null {
  const text = truncateAtStopMarker(reply);
  let last: RegExpMatchArray | null = null;
  for (const match of text.matchAll(OPENING_TAG)) {
    last = match;
  }
  if (!last || last.index === undefined) {
    return null;
  }
  const kind = last[1];
  if (!isActionKind(kind)) {
    return null;
  }
  const argument = text.slice(last.index + last[0].length).trim();
  if (!argument) {
    return null;
  }
  return { kind, argument };
}

export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}

export function formatAction(action: Action): string {
  return `<${action.kind}>${action.argument}</${action.kind}>`;
}

export function formatObservationPrompt(action: Action, observation: string, turn: number): string {
  return `${formatAction(action)}'s output: \nObservation ${turn}\n${observation}`;
}
