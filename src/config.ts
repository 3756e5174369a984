import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";
import type { RelayConfig } from "./types.js";

type RawConfig = Record<string, unknown>;

export const CONFIG_FILE_NAME = ".vision-relay.yaml";

export const DEFAULT_BASE_URL = "https://api.deepinfra.com/v1/openai";
export const DEFAULT_MODEL = "meta-llama/Llama-3.2-11B-Vision-Instruct";

export const DEFAULT_SYSTEM_PROMPT = `You are a highly capable assistant with advanced vision capabilities.
Your task is to analyze images and respond to queries about them with detailed, accurate,
and insightful information. When describing images, focus on key elements, colors, composition,
and any notable features. For questions about an image, give comprehensive answers drawing
on broad general knowledge. Always strive for clarity, precision, and depth in your responses.
Do not mention AI vendors, models, or language models in your response.
`;

/** Environment variable for each config key. */
const ENV_KEYS = {
  apiKey: "VISION_RELAY_API_KEY",
  baseUrl: "VISION_RELAY_BASE_URL",
  model: "VISION_RELAY_MODEL",
  temperature: "VISION_RELAY_TEMPERATURE",
  maxTokens: "VISION_RELAY_MAX_TOKENS",
  timeoutMs: "VISION_RELAY_TIMEOUT_MS",
  maxPixels: "VISION_RELAY_MAX_PIXELS",
  jpegQuality: "VISION_RELAY_JPEG_QUALITY",
  systemPrompt: "VISION_RELAY_SYSTEM_PROMPT",
  httpPort: "VISION_RELAY_HTTP_PORT",
  host: "VISION_RELAY_HOST",
  bodyLimit: "VISION_RELAY_BODY_LIMIT",
  logLevel: "VISION_RELAY_LOG_LEVEL",
} as const;

const configSchema = z.object({
  apiKey: z.string().min(1, "apiKey is required"),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  model: z.string().min(1).default(DEFAULT_MODEL),
  temperature: z.coerce.number().min(0).max(2).default(0.4),
  maxTokens: z.coerce.number().int().positive().default(400),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  maxPixels: z.coerce.number().int().positive().default(1_700_000),
  jpegQuality: z.coerce.number().int().min(1).max(100).default(85),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  httpPort: z.coerce.number().int().min(0).max(65535).default(5000),
  host: z.string().min(1).default("0.0.0.0"),
  bodyLimit: z.string().min(1).default("25mb"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Resolve environment variable references in config values
 * Supports syntax like "${ENV_VAR_NAME}"
 */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const envValue = env[varName];
      if (!envValue) {
        throw new Error(`Environment variable not found: ${varName}`);
      }
      return envValue;
    });
  }
  if (typeof value === "object" && value !== null) {
    if (Array.isArray(value)) {
      return value.map((v) => resolveEnvVars(v, env));
    }
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveEnvVars(v, env)])
    );
  }
  return value;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find config file location
 */
function getConfigPath(env: NodeJS.ProcessEnv, cwd: string, homeDir: string): string | null {
  const customPath = env.VISION_RELAY_CONFIG_PATH;
  if (customPath) {
    return customPath;
  }

  const localPath = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(localPath)) {
    return localPath;
  }

  const homePath = path.join(homeDir, CONFIG_FILE_NAME);
  if (fs.existsSync(homePath)) {
    return homePath;
  }

  return null;
}

/**
 * Load config from YAML file
 */
function loadConfigFile(configPath: string): RawConfig {
  try {
    const content = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.load(content);
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRawConfig(parsed)) {
      throw new Error(`Config file must contain a mapping: ${configPath}`);
    }
    logger.debug("Loaded config from file", { configPath });
    return parsed;
  } catch (error) {
    logger.error(
      "Failed to load config file",
      error instanceof Error ? error : new Error(String(error))
    );
    throw error;
  }
}

/**
 * Collect the config keys that are set in the environment
 */
function readEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
  const values: RawConfig = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== "") {
      values[key] = value;
    }
  }
  return values;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load configuration with precedence:
 * 1. VISION_RELAY_* environment variables
 * 2. YAML config file (VISION_RELAY_CONFIG_PATH, ./.vision-relay.yaml, ~/.vision-relay.yaml)
 * 3. Built-in defaults
 *
 * The result is frozen; nothing reads configuration after startup.
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const configPath = getConfigPath(env, cwd, homeDir);
  let fileConfig: RawConfig = {};
  if (configPath) {
    logger.info("Using YAML configuration file", { configPath });
    const resolved = resolveEnvVars(loadConfigFile(configPath), env);
    fileConfig = isRawConfig(resolved) ? resolved : {};
  }

  const result = configSchema.safeParse({ ...fileConfig, ...readEnvConfig(env) });
  if (!result.success) {
    if (!configPath && !env[ENV_KEYS.apiKey]) {
      throw new Error(
        `No configuration found. Set ${ENV_KEYS.apiKey} or create ~/${CONFIG_FILE_NAME}`
      );
    }
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  return Object.freeze({
    provider: Object.freeze({
      apiKey: parsed.apiKey,
      baseUrl: parsed.baseUrl,
      model: parsed.model,
      temperature: parsed.temperature,
      maxTokens: parsed.maxTokens,
      timeoutMs: parsed.timeoutMs,
    }),
    image: Object.freeze({
      maxPixels: parsed.maxPixels,
      jpegQuality: parsed.jpegQuality,
    }),
    systemPrompt: parsed.systemPrompt,
    httpPort: parsed.httpPort,
    host: parsed.host,
    bodyLimit: parsed.bodyLimit,
    logLevel: parsed.logLevel,
  });
}
