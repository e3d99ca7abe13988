import { readFile } from "fs/promises";
import { resolve } from "path";
import { ConfigError } from "./errors.js";

/**
 * Configuration file types
 *
 * Every field is optional in `sylvan.config.json`; missing fields fall back
 * to DEFAULT_CONFIG.
 */

export interface ParserConfig {
  /** Tokens error recovery may skip before giving up on a window */
  recoveryLookahead: number;
  /** Tokens a recovery candidate must accept to be chosen */
  recoveryConfirmTokens: number;
  /** Parser operations between cancellation checks */
  cancellationCheckInterval: number;
  /** Default parse timeout; 0 disables it */
  timeoutMs: number;
}

export interface DocumentConfig {
  /** Largest document a session will open, in bytes */
  maxDocumentBytes: number;
}

export interface Config {
  parser: ParserConfig;
  documents: DocumentConfig;
}

export const DEFAULT_CONFIG: Config = {
  parser: {
    recoveryLookahead: 8,
    recoveryConfirmTokens: 2,
    cancellationCheckInterval: 100,
    timeoutMs: 0,
  },
  documents: {
    maxDocumentBytes: 10 * 1024 * 1024,
  },
};

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || resolve(process.cwd(), "sylvan.config.json");

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      // Config file not found, use defaults
      return structuredClone(DEFAULT_CONFIG);
    }
    throw error;
  }

  let userConfig: unknown;
  try {
    userConfig = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Malformed config: ${error instanceof Error ? error.message : String(error)}`, path);
  }
  if (!isRecord(userConfig)) {
    throw new ConfigError("Config must be a JSON object", path);
  }

  // Merge section by section over the defaults
  return {
    parser: mergeNumbers(DEFAULT_CONFIG.parser, userConfig.parser, "parser", path),
    documents: mergeNumbers(DEFAULT_CONFIG.documents, userConfig.documents, "documents", path),
  };
}

function mergeNumbers<T extends object>(
  defaults: T,
  override: unknown,
  section: string,
  path: string
): T {
  if (override === undefined) return { ...defaults };
  if (!isRecord(override)) {
    throw new ConfigError(`"${section}" must be an object`, path);
  }
  const merged = { ...defaults };
  for (const key of Object.keys(defaults)) {
    const value = override[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`"${section}.${key}" must be a non-negative number`, path);
    }
    Object.assign(merged, { [key]: value });
  }
  return merged;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
