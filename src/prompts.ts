import { existsSync } from "node:fs";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export const REACT_INSTRUCTIONS = `Solve a question answering task with interleaving Thought, Action, Observation steps.
Thought can reason about the current situation.
Observation is understanding relevant information from an Action's output.
Action can be of three types:
(1) <search>entity</search>, which searches the exact entity on Wikipedia and returns the first paragraph if it exists. If not, it will return some similar entities to search and you can try to search the information from those topics.
(2) <lookup>keyword</lookup>, which returns the next sentence containing keyword in the current context. This only does exact matches, so keep your searches short.
(3) <finish>answer</finish>, which returns the answer and finishes the task.

Write exactly one Action per turn and stop after its closing tag; the Observation will be provided to you.
Here are some examples.`;

export const REACT_EXAMPLES = `Question
Which river flows through the capital city of the country where the Eiffel Tower stands?

Thought 1
I need to search Eiffel Tower to find its country, then find the capital and the river that flows through it.

Action 1
<search>Eiffel Tower</search>

Observation 1
The Eiffel Tower is a wrought-iron lattice tower on the Champ de Mars in Paris, France.

Thought 2
The Eiffel Tower is in Paris, which is the capital of France. I need to search Paris and find the river.

Action 2
<search>Paris</search>

Observation 2
Paris is the capital and largest city of France. The city lies on the river Seine.

Thought 3
The river Seine flows through Paris, so the answer is the Seine.

Action 3
<finish>The Seine</finish>

Question
In what year was the programming language whose name comes from a British comedy group first released?

Thought 1
A programming language named after a British comedy group is Python, named after Monty Python. I need to search Python (programming language) and find its first release.

Action 1
<search>Python</search>

Observation 1
Could not find ["Python"]. Similar: ['Python (programming language)', 'Pythonidae', 'Monty Python', 'Python (mythology)'].

Thought 2
I should search Python (programming language) instead.

Action 2
<search>Python (programming language)</search>

Observation 2
Python is a high-level, general-purpose programming language. Its design philosophy emphasizes code readability.

Thought 3
The summary does not give the release year. I can look up "first released".

Action 3
<lookup>first released</lookup>

Observation 3
Guido van Rossum began working on Python in the late 1980s as a successor to the ABC programming language and first released it in 1991.

Thought 4
Python was first released in 1991, so the answer is 1991.

Action 4
<finish>1991</finish>

Question
{question}`;

const QUESTION_PLACEHOLDER = "{question}";

export function assemblePrompt(instructions: string = REACT_INSTRUCTIONS, examples: string = REACT_EXAMPLES): string {
  return `${instructions}\n\n${examples}`;
}

export async function savePrompt(path: string, prompt: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, prompt, "utf8");
}

async function isPromptFile(source: string): Promise<boolean> {
  if (source.includes("\n") || !existsSync(source)) {
    return false;
  }
  const info = await stat(source);
  return info.isFile();
}

/**
 * Returns the contents of `source` when it names a file, otherwise `source` itself.
 */
export async function loadPrompt(source: string): Promise<string> {
  return (await isPromptFile(source)) ? readFile(source, "utf8") : source;
}

/**
 * Reads a saved prompt, or assembles the built-in one when `path` is unset or not a file.
 */
export async function loadPromptFile(path: string | undefined): Promise<string> {
  if (path && (await isPromptFile(path))) {
    return readFile(path, "utf8");
  }
  return assemblePrompt();
}

export function renderInitialPrompt(prompt: string, question: string): string {
  if (prompt.includes(QUESTION_PLACEHOLDER)) {
    return prompt.replace(QUESTION_PLACEHOLDER, () => question);
  }
  return `${prompt}\nQuestion: ${question}`;
}

export const SUMMARIZE_PROMPT_TEMPLATE = `Summarize the following Wikipedia extract in at most three sentences. Keep names, dates and figures exactly as written.

{text}`;

export function renderSummarizePrompt(text: string): string {
  return SUMMARIZE_PROMPT_TEMPLATE.replace("{text}", () => text);
}
