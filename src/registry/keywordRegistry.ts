/**
 * Keyword Registry
 *
 * Maps the short and long field aliases of both query dialects to canonical
 * field names. Built once from a keyword table and never mutated afterwards.
 *
 * All matching is case-insensitive; every canonical name is an alias of itself.
 */

import { ConfigurationError } from '../types/index.js';
import type { FieldKind, Keyword, KeywordTable } from '../types/index.js';

const FIELD_KINDS: readonly FieldKind[] = ['text', 'number', 'date', 'query'];

/**
 * Normalize an alias for lookup
 */
export function normalizeAlias(alias: string): string {
  return alias.trim().toLowerCase();
}

export class KeywordRegistry {
  private readonly byAlias: ReadonlyMap<string, Keyword>;
  private readonly canonical: ReadonlyMap<string, Keyword>;
  private readonly sortedAliases: readonly string[];

  private constructor(byAlias: Map<string, Keyword>, canonical: Map<string, Keyword>) {
    this.byAlias = byAlias;
    this.canonical = canonical;
    // Longest first so alternations built from this list prefer "author" over "a"
    this.sortedAliases = Object.freeze(
      [...byAlias.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b))
    );
  }

  /**
   * Build a registry from a keyword table, rejecting aliases claimed by two fields
   */
  static fromTable(table: KeywordTable, source?: string): KeywordRegistry {
    const byAlias = new Map<string, Keyword>();
    const canonical = new Map<string, Keyword>();

    for (const entry of table.fields) {
      const name = normalizeAlias(entry.name);
      if (!name) {
        throw new ConfigurationError('Keyword table entry has an empty field name', source);
      }
      if (!FIELD_KINDS.includes(entry.kind)) {
        throw new ConfigurationError(`Field '${name}' has unknown kind '${String(entry.kind)}'`, source);
      }
      if (canonical.has(name)) {
        throw new ConfigurationError(`Field '${name}' is defined more than once`, source);
      }

      const keyword: Keyword = Object.freeze({ name, kind: entry.kind });
      canonical.set(name, keyword);

      for (const rawAlias of [name, ...entry.aliases]) {
        const alias = normalizeAlias(rawAlias);
        if (!alias || /[\s:()]/.test(alias)) {
          throw new ConfigurationError(`Field '${name}' has invalid alias '${rawAlias}'`, source);
        }
        const existing = byAlias.get(alias);
        if (existing && existing.name !== name) {
          throw new ConfigurationError(
            `Alias '${alias}' maps to both '${existing.name}' and '${name}'`,
            source
          );
        }
        byAlias.set(alias, keyword);
      }
    }

    return new KeywordRegistry(byAlias, canonical);
  }

  /**
   * Resolve an alias to its canonical keyword; undefined when unknown
   */
  resolve(alias: string): Keyword | undefined {
    return this.byAlias.get(normalizeAlias(alias));
  }

  /**
   * Check whether a name is a canonical field name (not just an alias)
   */
  isCanonical(name: string): boolean {
    return this.canonical.has(normalizeAlias(name));
  }

  /** All known aliases, canonical names included, longest first */
  aliases(): readonly string[] {
    return this.sortedAliases;
  }

  canonicalNames(): string[] {
    return [...this.canonical.keys()].sort();
  }

  get size(): number {
    return this.byAlias.size;
  }
}
