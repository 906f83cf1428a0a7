/**
 * Tests for text normalization and statement dedup
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  cleanWhitespace,
  handleEncoding,
  keywordCoverage,
  normalizeText,
  prepareForParsing,
  tokenize
} from '../../optimizer/parser/textNormalizer';
import { deduplicateStatements, getDedupStats } from '../../optimizer/ingest/statementDedup';
import type { CapabilityStatement } from '../../optimizer/types';

function statement(id: string, text: string, source: CapabilityStatement['source'] = 'github'): CapabilityStatement {
  return { id, text, source, provenance: { kind: 'repository', reference: id } };
}

describe('Text Normalizer', () => {
  describe('normalizeText', () => {
    it('should lowercase and strip punctuation', () => {
      expect(normalizeText('Built REST APIs with Node.js!')).toBe('built rest apis with node.js');
    });

    it('should keep symbols that belong to technology names', () => {
      expect(normalizeText('C++ and C#, .NET')).toBe('c++ and c# net');
    });

    it('should return empty string for empty input', () => {
      expect(normalizeText('')).toBe('');
    });
  });

  it('should replace typographic characters', () => {
    expect(handleEncoding('\u201CSmart\u201D quotes \u2013 done\u2026')).toBe('"Smart" quotes - done...');
  });

  it('should collapse whitespace but keep paragraphs', () => {
    expect(cleanWhitespace('a\r\n\r\n\r\n\tb   c  \n  d')).toBe('a\n\nb c\nd');
  });

  it('should prepare text for parsing', () => {
    expect(prepareForParsing('  Senior\u00A0Engineer \u2014 Remote  ')).toBe('Senior Engineer - Remote');
  });

  it('should tokenize without stop words', () => {
    expect(tokenize('The API is built with Go and Rust')).toEqual(['api', 'built', 'go', 'rust']);
  });

  describe('keywordCoverage', () => {
    it('should count whole-word keyword hits', () => {
      expect(keywordCoverage('Built services in TypeScript and Node.js', ['typescript', 'node.js', 'kubernetes']))
        .toBeCloseTo(2 / 3);
    });

    it('should not match keywords inside other words', () => {
      expect(keywordCoverage('Wrote JavaScript tooling', ['java'])).toBe(0);
    });

    it('should treat an empty keyword list as covered', () => {
      expect(keywordCoverage('anything', [])).toBe(1);
    });
  });
});

describe('Statement Dedup', () => {
  it('should keep the first occurrence of equivalent statements', () => {
    const statements = [
      statement('github-1', 'Built REST APIs'),
      statement('linkedin-1', 'built rest apis!', 'linkedin'),
      statement('github-2', '...'),
      statement('scholar-1', 'Published a paper', 'scholar')
    ];

    const unique = deduplicateStatements(statements);

    expect(unique.map(item => item.id)).toEqual(['github-1', 'scholar-1']);
    expect(unique[0].source).toBe('github');
  });

  it('should report dedup statistics', () => {
    const statements = [statement('a', 'Same text'), statement('b', 'same  TEXT'), statement('c', 'Other')];
    const stats = getDedupStats(statements, deduplicateStatements(statements));
    expect(stats).toEqual({ total: 3, unique: 2, duplicates: 1 });
  });

  it('should keep exactly the first statement of every normalized text', () => {
    const text = fc.constantFrom('Built APIs', 'built apis', 'Built  APIs!', 'Wrote docs', 'WROTE DOCS', '?!', '');
    fc.assert(
      fc.property(fc.array(text, { maxLength: 12 }), texts => {
        const statements = texts.map((value, i) => statement(`s${i}`, value));
        const unique = deduplicateStatements(statements);
        const keys = unique.map(item => normalizeText(item.text));

        expect(new Set(keys).size).toBe(keys.length);
        expect(keys).not.toContain('');
        for (const item of unique) {
          const first = statements.findIndex(candidate => normalizeText(candidate.text) === normalizeText(item.text));
          expect(item.id).toBe(`s${first}`);
        }
        expect(deduplicateStatements(unique)).toEqual(unique);
      })
    );
  });
});
