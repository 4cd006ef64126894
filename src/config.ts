import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { MAX_TURN_BUDGET } from "./actions";

loadEnv();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    return value ? ["1", "true", "yes", "on"].includes(value.trim().toLowerCase()) : false;
  });

const SettingsSchema = z.object({
  openaiApiKey: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .min(1, "OPENAI_API_KEY is required"),
  openaiModel: z.string().min(1).default("gpt-4o-mini"),
  openaiBaseUrl: z.string().min(1).default("https://api.openai.com/v1"),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  topP: z.coerce.number().min(0).max(1).default(1),
  maxTokens: z.coerce.number().int().positive().default(1024),
  maxTurns: z.coerce.number().int().positive().max(MAX_TURN_BUDGET).default(MAX_TURN_BUDGET),
  wikipediaLanguage: z
    .string()
    .regex(/^[a-z-]+$/, "WIKIPEDIA_LANGUAGE must be a Wikipedia language code")
    .default("en"),
  summarySentences: z.coerce.number().int().positive().default(4),
  lookupWindow: z.coerce.number().int().positive().default(200),
  summarizeSearch: booleanFlag,
  promptFile: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export interface AgentConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  topP: number;
  maxTokens: number;
  maxTurns: number;
  wikipediaLanguage: string;
  summarySentences: number;
  lookupWindow: number;
  summarizeSearch: boolean;
  promptFile?: string;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function loadSettings(envPath?: string): Settings {
  if (envPath) {
    loadEnv({ path: envPath, override: false });
  }

  const model = process.env.MODEL_NAME || process.env.OPENAI_MODEL;
  const baseUrl = process.env.OPENAI_BASE_URL || process.env.BASE_URL;

  return SettingsSchema.parse({
    openaiApiKey: process.env.OPENAI_API_KEY,
    openaiModel: blankToUndefined(model),
    openaiBaseUrl: blankToUndefined(baseUrl),
    temperature: blankToUndefined(process.env.OPENAI_TEMPERATURE),
    topP: blankToUndefined(process.env.OPENAI_TOP_P),
    maxTokens: blankToUndefined(process.env.OPENAI_MAX_TOKENS),
    maxTurns: blankToUndefined(process.env.AGENT_MAX_TURNS),
    wikipediaLanguage: blankToUndefined(process.env.WIKIPEDIA_LANGUAGE),
    summarySentences: blankToUndefined(process.env.WIKIPEDIA_SUMMARY_SENTENCES),
    lookupWindow: blankToUndefined(process.env.LOOKUP_WINDOW),
    summarizeSearch: process.env.SEARCH_SUMMARIZE,
    promptFile: blankToUndefined(process.env.REACT_PROMPT_FILE),
  });
}

export function buildAgentConfig(settings: Settings): AgentConfig {
  return {
    apiKey: settings.openaiApiKey,
    model: settings.openaiModel,
    baseUrl: settings.openaiBaseUrl,
    temperature: settings.temperature,
    topP: settings.topP,
    maxTokens: settings.maxTokens,
    maxTurns: settings.maxTurns,
    wikipediaLanguage: settings.wikipediaLanguage,
    summarySentences: settings.summarySentences,
    lookupWindow: settings.lookupWindow,
    summarizeSearch: settings.summarizeSearch,
    promptFile: settings.promptFile,
  };
}
