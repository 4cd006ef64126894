import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  REACT_EXAMPLES,
  REACT_INSTRUCTIONS,
  assemblePrompt,
  loadPrompt,
  loadPromptFile,
  renderInitialPrompt,
  savePrompt,
} from "../src/prompts";

test("assemblePrompt joins instructions and examples with a blank line", () => {
  assert.equal(assemblePrompt("Do the task.", "Question\n{question}"), "Do the task.\n\nQuestion\n{question}");
  assert.equal(assemblePrompt(), `${REACT_INSTRUCTIONS}\n\n${REACT_EXAMPLES}`);
});

test("a saved prompt loads back unchanged", async () => {
  const dir = await mkdtemp(join(tmpdir(), "wiki-react-"));
  try {
    const path = join(dir, "nested", "react_prompt.txt");
    const prompt = assemblePrompt();
    await savePrompt(path, prompt);
    assert.equal(await loadPrompt(path), prompt);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("loadPrompt returns raw text when no such file exists", async () => {
  assert.equal(await loadPrompt("missing-prompt-file.txt"), "missing-prompt-file.txt");
  assert.equal(await loadPrompt("Line one\nQuestion: {question}"), "Line one\nQuestion: {question}");
});

test("loadPromptFile falls back to the built-in prompt for missing paths", async () => {
  assert.equal(await loadPromptFile("prompts/typo.txt"), assemblePrompt());
  assert.equal(await loadPromptFile(undefined), assemblePrompt());
});

test("loadPromptFile reads an existing prompt file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "wiki-react-"));
  try {
    const path = join(dir, "react_prompt.txt");
    await savePrompt(path, "Saved instructions\n{question}");
    assert.equal(await loadPromptFile(path), "Saved instructions\n{question}");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("renderInitialPrompt fills the question placeholder", () => {
  assert.equal(renderInitialPrompt("Examples\nQuestion\n{question}", "Who wrote $& tests?"), "Examples\nQuestion\nWho wrote $& tests?");
  assert.equal(renderInitialPrompt("Examples", "Where is Paris?"), "Examples\nQuestion: Where is Paris?");
});
