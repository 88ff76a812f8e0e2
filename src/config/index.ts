/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import {
  DEFAULT_PROMPTS_DIR,
  DEFAULT_SHAPE_RULES_PATH,
  DEFAULT_TAXONOMY_PATH,
  DEFAULT_TOPICS_PATH,
} from "./paths.js";

export { ConfigError, requireEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
export * from "./paths.js";

// Re-export taxonomy configuration module
export * from "./taxonomy/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type AppEnvironment = (typeof ENVIRONMENTS)[number];
export type AppLogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Log level */
  readonly logLevel: AppLogLevel;
  /** Application name, also used as the log file stem */
  readonly appName: string;
  /** Mirror log lines into a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Tag, alias and content-type table */
  readonly taxonomyPath: string;
  /** Ordered topic registry */
  readonly topicsPath: string;
  /** Ordered content-shape rule table */
  readonly shapeRulesPath: string;
  /** Directory holding catalog.json and the prompt templates */
  readonly promptsDir: string;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Load and validate application configuration from the environment.
 * Fails fast on values that cannot be used.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!isOneOf(ENVIRONMENTS, nodeEnv)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isOneOf(LOG_LEVELS, logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }

  return Object.freeze({
    env: nodeEnv,
    logLevel,
    appName: optionalEnv("APP_NAME", "bookmark-enricher", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    taxonomyPath: optionalEnv("TAXONOMY_FILE", DEFAULT_TAXONOMY_PATH, env),
    topicsPath: optionalEnv("TOPICS_FILE", DEFAULT_TOPICS_PATH, env),
    shapeRulesPath: optionalEnv("SHAPE_RULES_FILE", DEFAULT_SHAPE_RULES_PATH, env),
    promptsDir: optionalEnv("PROMPTS_DIR", DEFAULT_PROMPTS_DIR, env),
  });
}
