/**
 * Capability Statement Deduplication
 *
 * Statements are keyed by their normalized text (see normalizeText). The
 * first occurrence wins and keeps its provenance; later duplicates are
 * dropped, whichever source they came from.
 */

import { normalizeText } from '../parser/textNormalizer';
import type { CapabilityStatement } from '../types';

export interface DedupStats {
  total: number;
  unique: number;
  duplicates: number;
}

export function deduplicateStatements(statements: CapabilityStatement[]): CapabilityStatement[] {
  const seen = new Set<string>();
  const unique: CapabilityStatement[] = [];

  for (const statement of statements) {
    const key = normalizeText(statement.text);
    if (key.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(statement);
  }

  return unique;
}

/**
 * Counts for one dedup pass, from its input and output
 */
export function getDedupStats(before: CapabilityStatement[], after: CapabilityStatement[]): DedupStats {
  return {
    total: before.length,
    unique: after.length,
    duplicates: before.length - after.length
  };
}
