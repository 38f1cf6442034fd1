// Configuration loader and validator

import fs from "fs";
import path from "path";
import { homedir } from "os";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { SystemConfig, LLMConfig } from "../types/index.js";
import { deepFreeze } from "../utils/freeze.js";

const DEFAULT_FARE_DATA_PATH = fileURLToPath(new URL("../../data/fares.json", import.meta.url));

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const ConfigFileSchema = z.object({
  storage: z
    .object({
      sessionsPath: z.string().min(1),
      logsPath: z.string().min(1),
      outputPath: z.string().min(1),
      fareDataPath: z.string().min(1),
    })
    .partial()
    .optional(),
  history: z
    .object({
      dispatcher: z.number().int().min(2),
      worker: z.number().int().min(2),
    })
    .partial()
    .optional(),
  loopLimits: z
    .object({
      dispatcher: z.number().int().positive(),
      worker: z.number().int().positive(),
    })
    .partial()
    .optional(),
  approval: z
    .object({
      maxDecisionAttempts: z.number().int().positive(),
    })
    .partial()
    .optional(),
  rules: z
    .object({
      maxAmount: z.number().positive(),
      supervisorApprovalThreshold: z.number().nonnegative(),
      claimWindowDays: z.number().int().positive(),
      commuterRoutes: z.array(z.tuple([z.string(), z.string()])),
    })
    .partial()
    .optional(),
  llm: z
    .object({
      apiKey: z.string(),
      baseURL: z.string().url(),
      model: z.string(),
      temperature: z.number().min(0).max(2),
      maxTokens: z.number().int().positive(),
    })
    .partial()
    .optional(),
  logLevel: LogLevelSchema.optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function getStorageBase(env: NodeJS.ProcessEnv = process.env): string {
  return env.INTAKEBOT_HOME || path.join(homedir(), ".intakebot");
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.INTAKEBOT_CONFIG;
  if (envPath) {return envPath;}
  return path.join(getStorageBase(env), "config.json");
}

/**
 * Load the configuration.
 * Priority: env > config.json > defaults. The result is deep-frozen.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const filePath = configPath || getConfigPath(env);
  const defaults = getDefaultConfig(env);

  if (!fs.existsSync(filePath)) {
    return deepFreeze(applyEnvironmentVariables(defaults, env));
  }

  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const parsed = ConfigFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
      console.warn(`Invalid config in ${filePath} (${issues}), using defaults`);
      return deepFreeze(applyEnvironmentVariables(defaults, env));
    }
    return deepFreeze(applyEnvironmentVariables(mergeWithDefaults(parsed.data, defaults), env));
  } catch (error) {
    console.warn(`Failed to load config from ${filePath}, using defaults`, error instanceof Error ? error.message : error);
    return deepFreeze(applyEnvironmentVariables(defaults, env));
  }
}

/**
 * Apply environment variables to config
 */
function applyEnvironmentVariables(config: SystemConfig, env: NodeJS.ProcessEnv): SystemConfig {
  const result: SystemConfig = { ...config, storage: { ...config.storage } };

  if (env.INTAKEBOT_OUTPUT_DIR) {
    result.storage.outputPath = env.INTAKEBOT_OUTPUT_DIR;
  }

  const level = LogLevelSchema.safeParse(env.INTAKEBOT_LOG_LEVEL);
  if (level.success) {
    result.logLevel = level.data;
  }

  result.llm = applyLLMEnvironmentVariables(config.llm, env);

  return result;
}

/**
 * Apply LLM environment variables to config
 */
function applyLLMEnvironmentVariables(llmConfig: LLMConfig | undefined, env: NodeJS.ProcessEnv): LLMConfig | undefined {
  const llm: LLMConfig = llmConfig ? { ...llmConfig } : {};

  if (env.OPENAI_API_KEY) {
    llm.apiKey = env.OPENAI_API_KEY;
  }

  if (env.OPENAI_BASE_URL) {
    llm.baseURL = env.OPENAI_BASE_URL;
  }

  if (env.LLM_MODEL) {
    llm.model = env.LLM_MODEL;
  }

  if (env.LLM_TEMPERATURE) {
    const temp = parseFloat(env.LLM_TEMPERATURE);
    if (!isNaN(temp)) {
      llm.temperature = temp;
    }
  }

  if (env.LLM_MAX_TOKENS) {
    const tokens = parseInt(env.LLM_MAX_TOKENS, 10);
    if (!isNaN(tokens)) {
      llm.maxTokens = tokens;
    }
  }

  // Return undefined if no LLM config is set
  if (Object.keys(llm).length === 0) {
    return undefined;
  }

  return llm;
}

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const base = getStorageBase(env);
  return {
    storage: {
      sessionsPath: path.join(base, "sessions"),
      logsPath: path.join(base, "logs"),
      outputPath: path.join(base, "output"),
      fareDataPath: DEFAULT_FARE_DATA_PATH,
    },
    history: {
      dispatcher: 30,
      worker: 20,
    },
    loopLimits: {
      dispatcher: 10,
      worker: 6,
    },
    approval: {
      maxDecisionAttempts: 5,
    },
    rules: {
      maxAmount: 30000,
      supervisorApprovalThreshold: 5000,
      claimWindowDays: 90,
      commuterRoutes: [
        ["上野", "豊洲"],
        ["目黒", "豊洲"],
        ["川崎", "豊洲"],
      ],
    },
    logLevel: "info",
  };
}

function mergeWithDefaults(config: ConfigFile, defaults: SystemConfig): SystemConfig {
  return {
    storage: { ...defaults.storage, ...config.storage },
    history: { ...defaults.history, ...config.history },
    loopLimits: { ...defaults.loopLimits, ...config.loopLimits },
    approval: { ...defaults.approval, ...config.approval },
    rules: { ...defaults.rules, ...config.rules },
    llm: config.llm,
    logLevel: config.logLevel ?? defaults.logLevel,
  };
}

export function ensureStorageDirectories(config: SystemConfig): void {
  for (const dir of [config.storage.sessionsPath, config.storage.logsPath, config.storage.outputPath]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
