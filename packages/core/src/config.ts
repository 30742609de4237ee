/**
 * sublisp configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { EvalLimits } from "./evaluator.js";

const limitSchema = z.number().int().positive();

export const configSchema = z
  .object({
    version: z.number().int().default(1),
    limits: z
      .object({
        maxDepth: limitSchema.optional(),
        maxSteps: limitSchema.optional(),
        timeMs: limitSchema.optional(),
      })
      .strict()
      .default({}),
    strictArity: z.boolean().default(false),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export class ConfigError extends Error {
  code = "E_CONFIG";
  file: string;

  constructor(file: string, message: string) {
    super(`Invalid config ${file}: ${message}`);
    this.name = "ConfigError";
    this.file = file;
  }
}

export const PROJECT_CONFIG_FILE = ".sublisp.json";

export function defaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Resolve config from project or user files.
 * Precedence: ./.sublisp.json > ~/.sublisp/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".sublisp", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: defaultConfig(), source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

/** Null when the file does not exist; throws ConfigError when it is invalid. */
function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError(filePath, e instanceof Error ? e.message : String(e));
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(filePath, msg);
  }
  return result.data;
}

/**
 * Evaluation limits from config, with command-line overrides on top.
 */
export function toEvalLimits(config: Config, overrides: EvalLimits = {}): EvalLimits {
  return {
    maxDepth: overrides.maxDepth ?? config.limits.maxDepth,
    maxSteps: overrides.maxSteps ?? config.limits.maxSteps,
    timeMs: overrides.timeMs ?? config.limits.timeMs,
  };
}
