import test from "node:test";
import assert from "node:assert/strict";

import { ReActSession } from "../src/session";

test("a new session continues and has no history", () => {
  const session = new ReActSession();
  assert.equal(session.shouldContinue, true);
  assert.equal(session.lastTopic(), undefined);
  assert.deepEqual(session.sources, []);
});

test("recordSearch keeps topics and sources parallel", () => {
  const session = new ReActSession();
  session.recordSearch("Paris", "https://en.wikipedia.org/wiki/Paris");
  session.recordSearch("Seine", "https://en.wikipedia.org/wiki/Seine");
  assert.deepEqual(session.searchHistory, ["Paris", "Seine"]);
  assert.deepEqual(session.sources, [
    "https://en.wikipedia.org/wiki/Paris",
    "https://en.wikipedia.org/wiki/Seine",
  ]);
  assert.equal(session.lastTopic(), "Seine");
});

test("finish stops the session until it is resumed", () => {
  const session = new ReActSession();
  session.recordSearch("Paris", "https://en.wikipedia.org/wiki/Paris");
  session.finish("The Seine");
  assert.equal(session.shouldContinue, false);
  assert.equal(session.answer, "The Seine");

  session.resume();
  assert.equal(session.shouldContinue, true);
  assert.equal(session.answer, undefined);
  assert.equal(session.lastTopic(), "Paris");
});

test("reset clears the search history", () => {
  const session = new ReActSession();
  session.recordSearch("Paris", "https://en.wikipedia.org/wiki/Paris");
  session.finish("done");
  session.reset();
  assert.deepEqual(session.searchHistory, []);
  assert.deepEqual(session.sources, []);
  assert.equal(session.shouldContinue, true);
});
