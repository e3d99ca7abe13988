/**
 * LanguageRegistry - languages by id, name and file extension, together
 * with the editor queries attached to each.
 */

import { extname } from "node:path";
import { DuplicateLanguageError, UnknownLanguageError } from "../errors.js";
import { InjectionQuery } from "../highlight/injections.js";
import { RangesQuery } from "../highlight/ranges.js";
import type { Language } from "../language/language.js";
import { Query } from "../query/query.js";
import type { QueryOptions } from "../query/types.js";

export interface LanguageEntry {
  readonly id: number;
  readonly name: string;
  readonly language: Language;
  readonly extensions: readonly string[];
  highlights: Query | null;
  folds: RangesQuery | null;
  indents: RangesQuery | null;
  injections: InjectionQuery | null;
}

export interface RegisterOptions {
  /** File extensions including the dot, e.g. [".sexp"] */
  extensions?: string[];
}

export class LanguageRegistry {
  private entries = new Map<number, LanguageEntry>();
  private nextId = 0;

  /**
   * Register a language under a unique name.
   *
   * @throws DuplicateLanguageError when the name is taken
   * @returns the id the language is looked up by
   */
  register(name: string, language: Language, options: RegisterOptions = {}): number {
    if (this.getByName(name)) {
      throw new DuplicateLanguageError(name);
    }
    const id = this.nextId++;
    this.entries.set(id, {
      id,
      name,
      language,
      extensions: (options.extensions ?? []).map((ext) => ext.toLowerCase()),
      highlights: null,
      folds: null,
      indents: null,
      injections: null,
    });
    return id;
  }

  get(id: number): LanguageEntry | null {
    return this.entries.get(id) ?? null;
  }

  getByName(name: string): LanguageEntry | null {
    for (const entry of this.entries.values()) {
      if (entry.name === name) return entry;
    }
    return null;
  }

  /** Language for a file path, by extension */
  forFile(path: string): LanguageEntry | null {
    const ext = extname(path).toLowerCase();
    if (!ext) return null;
    for (const entry of this.entries.values()) {
      if (entry.extensions.includes(ext)) return entry;
    }
    return null;
  }

  languages(): LanguageEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Remove a language. Its Language handle is left alive; trees built from
   * it stay usable.
   */
  unregister(id: number): boolean {
    return this.entries.delete(id);
  }

  private require(id: number): LanguageEntry {
    const entry = this.entries.get(id);
    if (!entry) throw new UnknownLanguageError(id);
    return entry;
  }

  /**
   * Attach the highlights query.
   *
   * @returns the query's capture names, indexed by capture id
   */
  setHighlightsQuery(id: number, source: string, options?: QueryOptions): readonly string[] {
    const entry = this.require(id);
    entry.highlights = new Query(entry.language, source, options);
    return entry.highlights.captureNames;
  }

  setFoldsQuery(id: number, source: string, options?: QueryOptions): readonly string[] {
    const entry = this.require(id);
    entry.folds = new RangesQuery(entry.language, source, "fold", options);
    return entry.folds.query.captureNames;
  }

  setIndentsQuery(id: number, source: string, options?: QueryOptions): readonly string[] {
    const entry = this.require(id);
    entry.indents = new RangesQuery(entry.language, source, "indent", options);
    return entry.indents.query.captureNames;
  }

  setInjectionsQuery(id: number, source: string, options?: QueryOptions): readonly string[] {
    const entry = this.require(id);
    entry.injections = new InjectionQuery(entry.language, source, options);
    return entry.injections.query.captureNames;
  }
}
