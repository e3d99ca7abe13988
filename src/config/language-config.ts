/**
 * Language configuration loader
 *
 * Extra languages are listed in ~/.sylvan/config.json and registered
 * alongside the built-in grammars. Relative paths in the file resolve
 * against the directory the file lives in.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { isRecord } from "../config.js";
import { ConfigError } from "../errors.js";
import { attachQueries } from "../registry/builtin.js";
import type { LanguageRegistry } from "../registry/registry.js";
import { loadLanguage } from "../language/language.js";

/**
 * A language supplied by the user
 */
export interface LanguageConfig {
  /** Path to the grammar's table blob (grammar.json) */
  grammar: string;
  /** File extensions (e.g., [".sexp"]) */
  extensions: string[];
  highlights?: string;
  folds?: string;
  indents?: string;
  injections?: string;
}

/**
 * Full configuration file structure
 */
export interface SylvanConfigFile {
  languages?: Record<string, LanguageConfig>;
}

export const CONFIG_DIR = join(homedir(), ".sylvan");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

const QUERY_KEYS = ["highlights", "folds", "indents", "injections"] as const;

function parseLanguageConfig(name: string, raw: unknown, path: string): LanguageConfig {
  if (!isRecord(raw)) throw new ConfigError(`languages.${name} must be an object`, path);
  const { grammar, extensions } = raw;
  if (typeof grammar !== "string") {
    throw new ConfigError(`languages.${name}.grammar must be a path`, path);
  }
  if (!Array.isArray(extensions) || !extensions.every((e): e is string => typeof e === "string")) {
    throw new ConfigError(`languages.${name}.extensions must be a list of strings`, path);
  }
  const config: LanguageConfig = { grammar, extensions };
  for (const key of QUERY_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigError(`languages.${name}.${key} must be a path`, path);
    }
    config[key] = value;
  }
  return config;
}

/**
 * Load the language configuration. A missing file is an empty config.
 *
 * @throws ConfigError when the file is unreadable or malformed
 */
export function loadLanguageConfig(path: string = CONFIG_FILE): SylvanConfigFile {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read language config: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
  if (!isRecord(parsed)) throw new ConfigError("Language config must be a JSON object", path);

  const languages = parsed.languages;
  if (languages === undefined) return {};
  if (!isRecord(languages)) throw new ConfigError("languages must be an object", path);
  const result: Record<string, LanguageConfig> = {};
  for (const [name, raw] of Object.entries(languages)) {
    result[name] = parseLanguageConfig(name, raw, path);
  }
  return { languages: result };
}

/**
 * Save the language configuration, creating its directory if needed
 */
export function saveLanguageConfig(config: SylvanConfigFile, path: string = CONFIG_FILE): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2));
}

/**
 * Add or replace a configured language
 */
export function addCustomLanguage(
  name: string,
  language: LanguageConfig,
  path: string = CONFIG_FILE
): void {
  const config = loadLanguageConfig(path);
  config.languages = { ...config.languages, [name]: language };
  saveLanguageConfig(config, path);
}

/**
 * Remove a configured language
 *
 * @returns false when no language of that name was configured
 */
export function removeCustomLanguage(name: string, path: string = CONFIG_FILE): boolean {
  const config = loadLanguageConfig(path);
  if (!config.languages || !Object.hasOwn(config.languages, name)) {
    return false;
  }
  const languages = { ...config.languages };
  delete languages[name];
  config.languages = languages;
  saveLanguageConfig(config, path);
  return true;
}

/**
 * Register every configured language not already in `registry`.
 * Configured languages have no external scanner.
 *
 * @returns ids of the languages registered by this call
 */
export function registerConfiguredLanguages(
  registry: LanguageRegistry,
  path: string = CONFIG_FILE
): number[] {
  const config = loadLanguageConfig(path);
  const base = dirname(path);
  const at = (file: string | undefined): string | undefined =>
    file === undefined ? undefined : isAbsolute(file) ? file : resolve(base, file);

  const ids: number[] = [];
  for (const [name, language] of Object.entries(config.languages ?? {})) {
    if (registry.getByName(name)) continue;
    const grammarPath = at(language.grammar) ?? language.grammar;
    let blob: Buffer;
    try {
      blob = readFileSync(grammarPath);
    } catch (error) {
      throw new ConfigError(
        `Cannot read grammar for "${name}": ${error instanceof Error ? error.message : String(error)}`,
        grammarPath
      );
    }
    const id = registry.register(name, loadLanguage(blob), { extensions: language.extensions });
    attachQueries(registry, id, {
      highlights: at(language.highlights),
      folds: at(language.folds),
      indents: at(language.indents),
      injections: at(language.injections),
    });
    ids.push(id);
  }
  return ids;
}

/**
 * Example config for reference
 */
export const EXAMPLE_CONFIG: SylvanConfigFile = {
  languages: {
    notes: {
      grammar: "grammars/notes/grammar.json",
      extensions: [".notes"],
      highlights: "grammars/notes/highlights.scm",
    },
  },
};
