#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { createInterface } from "readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { ReActAgent } from "./agent";
import { OpenAIChatBackend } from "./chat";
import { buildAgentConfig, loadSettings } from "./config";
import { assemblePrompt, loadPromptFile, savePrompt } from "./prompts";
import { createConsoleStreamObserver } from "./stream";
import { WikipediaClient } from "./wikipedia";

interface CliOptions {
  maxTurns?: number;
  debug?: boolean;
  promptFile?: string;
  savePrompt?: string;
  followUp?: boolean;
}

function parseTurns(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed;
}

async function ask(question: string): Promise<string> {
  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question(question);
    return answer.trim();
  } finally {
    rl.close();
  }
}

async function main() {
  const program = new Command();
  program
    .name("wiki-react")
    .description("Answer a question with a ReAct loop over Wikipedia search and lookup.")
    .argument("[question]", "Question for the agent")
    .option("--max-turns <n>", "Maximum number of model calls (1-8)", parseTurns)
    .option("--debug", "Print the turn-by-turn transcript", false)
    .option("--prompt-file <path>", "Load the ReAct prompt from this file when it exists")
    .option("--save-prompt <path>", "Write the assembled ReAct prompt to a file and exit")
    .option("--follow-up", "Keep asking follow-up questions on the same session", false)
    .action(async (questionArg: string | undefined, options: CliOptions) => {
      if (options.savePrompt) {
        await savePrompt(options.savePrompt, assemblePrompt());
        console.log(`Prompt written to ${options.savePrompt}`);
        return;
      }

      const question = questionArg ?? (await ask("Enter a question for the agent: "));
      if (!question) {
        throw new Error("A question is required.");
      }

      const settings = loadSettings();
      const agentConfig = buildAgentConfig(settings);
      const prompt = await loadPromptFile(options.promptFile ?? agentConfig.promptFile);
      const backend = new OpenAIChatBackend(agentConfig);
      const agent = new ReActAgent(agentConfig, {
        backend,
        knowledge: new WikipediaClient({
          language: agentConfig.wikipediaLanguage,
          summarySentences: agentConfig.summarySentences,
        }),
        prompt,
        summarizer: agentConfig.summarizeSearch ? backend : undefined,
      });
      const streamObserver = createConsoleStreamObserver({ writer: output });

      let current = question;
      while (current) {
        try {
          const { answer, transcript } = await agent.run(current, {
            maxTurns: options.maxTurns,
            debug: options.debug,
            streamObserver,
          });
          if (options.debug && transcript?.length) {
            console.log("\n--- Transcript ---\n" + transcript.join("\n\n"));
          }
          if (answer !== undefined) {
            console.log("\nAnswer:\n" + answer);
          } else {
            console.log(`\nNo answer within ${options.maxTurns ?? agentConfig.maxTurns} turns.`);
          }
        } catch (error) {
          console.error(`Agent run failed: ${String(error)}`);
          process.exitCode = 1;
          return;
        }
        current = options.followUp ? await ask("\nFollow-up question (empty to quit): ") : "";
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
