import test from "node:test";
import assert from "node:assert/strict";

import { MAX_TURN_BUDGET } from "../src/actions";
import { DisambiguationError, PageNotFoundError, TurnBudgetError, isMissingTopicError } from "../src/errors";

test("loading the errors does not load the settings module", () => {
  const loaded = Object.keys(require.cache).map((path) => path.replace(/\\/g, "/"));
  assert.ok(loaded.some((path) => path.endsWith("/src/errors.ts")));
  assert.equal(loaded.some((path) => path.endsWith("/src/config.ts")), false);
});

test("TurnBudgetError names the allowed range", () => {
  const error = new TurnBudgetError(9);
  assert.equal(MAX_TURN_BUDGET, 8);
  assert.equal(error.message, "Turn budget must be an integer between 1 and 8, got 9.");
  assert.equal(error.budget, 9);
});

test("isMissingTopicError recognises recoverable lookup failures", () => {
  assert.equal(isMissingTopicError(new PageNotFoundError("Zzyzx")), true);
  assert.equal(isMissingTopicError(new DisambiguationError("Mercury")), true);
  assert.equal(isMissingTopicError(new Error("boom")), false);
});
