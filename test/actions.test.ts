import test from "node:test";
import assert from "node:assert/strict";

import {
  CORRECTIVE_PROMPT,
  STOP_MARKERS,
  formatObservationPrompt,
  parseAction,
  truncateAtStopMarker,
} from "../src/actions";

test("stop markers cover the three closing tags", () => {
  assert.deepEqual(STOP_MARKERS, ["</search>", "</lookup>", "</finish>"]);
});

test("truncateAtStopMarker cuts at the earliest marker", () => {
  assert.equal(truncateAtStopMarker("x</lookup>y</search>z"), "x");
  assert.equal(truncateAtStopMarker("a</finish>b</search>c"), "a");
  assert.equal(truncateAtStopMarker("no markers here"), "no markers here");
});

test("parseAction reads a reply cut by the stop sequence", () => {
  const reply = "Thought 1\nI need the mathematician first.\n\nAction 1\n<search>Alan Turing";
  assert.deepEqual(parseAction(reply), { kind: "search", argument: "Alan Turing" });
});

test("parseAction ignores anything after the first closing marker", () => {
  const reply = "Action 2\n<lookup>born in</lookup>\nObservation 2\ninvented <search>Bletchley Park</search>";
  assert.deepEqual(parseAction(reply), { kind: "lookup", argument: "born in" });
});

test("parseAction takes the last opening tag", () => {
  assert.deepEqual(parseAction("I could <search>Paris or just answer <finish>The Seine"), {
    kind: "finish",
    argument: "The Seine",
  });
});

test("parseAction rejects replies without a usable action", () => {
  assert.equal(parseAction("Thought 1\nLet me think about it."), null);
  assert.equal(parseAction("<answer>42"), null);
  assert.equal(parseAction("<search>   "), null);
});

test("formatObservationPrompt wraps the action and observation", () => {
  const prompt = formatObservationPrompt({ kind: "search", argument: "Paris" }, "Capital of France.", 2);
  assert.equal(prompt, "<search>Paris</search>'s output: \nObservation 2\nCapital of France.");
});

test("corrective prompt asks for the trace format", () => {
  assert.match(CORRECTIVE_PROMPT, /thought-action-observation/);
});
