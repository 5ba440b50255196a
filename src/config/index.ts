/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError, type EnvSource } from "./env.js";

export const APP_ENVIRONMENTS = ["development", "production", "test"] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Directory for the log file */
  readonly logDir: string;
  /** Write log entries to a file as well as the console */
  readonly logToFile: boolean;
  /** Directory holding the scraped topic files */
  readonly topicsDir: string;
  /** Export path for the oral expression pipeline */
  readonly oralOutputFile: string;
  /** Export path for the written expression pipeline */
  readonly writtenOutputFile: string;
  /** Extra boilerplate rules merged into the built-in ones */
  readonly boilerplateFile?: string;
  /** Number of records shown per task by the sample display */
  readonly sampleSize: number;
}

/**
 * Build configuration from an environment source.
 * Throws ConfigError on the first invalid value.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    env: optionalEnvChoice("NODE_ENV", APP_ENVIRONMENTS, "development", env),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", true, env),
    topicsDir: optionalEnv("TOPICS_DIR", "output", env),
    oralOutputFile: optionalEnv("ORAL_OUTPUT_FILE", "organized_topics.json", env),
    writtenOutputFile: optionalEnv("WRITTEN_OUTPUT_FILE", "organized_ee_topics.json", env),
    boilerplateFile: maybeEnv("BOILERPLATE_FILE", env),
    sampleSize: optionalEnvInt("SAMPLE_SIZE", 3, env),
  };
}

/**
 * Validate cross-field constraints on a loaded configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (config.oralOutputFile === config.writtenOutputFile) {
    throw new ConfigError(
      `ORAL_OUTPUT_FILE and WRITTEN_OUTPUT_FILE must differ, both are: ${config.oralOutputFile}`
    );
  }

  if (config.sampleSize > 100) {
    throw new ConfigError(`Invalid SAMPLE_SIZE: ${config.sampleSize}. Must be at most 100.`);
  }
}
