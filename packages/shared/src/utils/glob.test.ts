import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { cachedPatternCount, globMatch, globToRegExp, MAX_CACHED_PATTERNS } from './glob.js';

// Names without glob metacharacters
const literalNameArb = fc.string({ minLength: 0, maxLength: 40 }).filter((s) => !/[*?[\]]/.test(s));

describe('Glob Matcher', () => {
  describe('wildcards', () => {
    it('should match any name with a lone star', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 60 }), (name) => {
          expect(globMatch(name, '*')).toBe(true);
        }),
        { numRuns: 100 }
      );
    });

    it('should match deck children with a prefix pattern', () => {
      expect(globMatch('Japanese::Verbs', 'Japanese::*')).toBe(true);
      expect(globMatch('Japanese::', 'Japanese::*')).toBe(true);
      expect(globMatch('English::Verbs', 'Japanese::*')).toBe(false);
      expect(globMatch('Japanese', 'Japanese::*')).toBe(false);
    });

    it('should let star cross separators', () => {
      expect(globMatch('Languages::Japanese::Kanji', 'Languages::*')).toBe(true);
      expect(globMatch('a/b/c', 'a*c')).toBe(true);
    });

    it('should match exactly one character with question mark', () => {
      expect(globMatch('Deck 1', 'Deck ?')).toBe(true);
      expect(globMatch('Deck 10', 'Deck ?')).toBe(false);
      expect(globMatch('Deck ', 'Deck ?')).toBe(false);
    });

    it('should count an emoji as one character', () => {
      expect(globMatch('Deck 😀', 'Deck ?')).toBe(true);
      expect(globMatch('Deck 😀😀', 'Deck ?')).toBe(false);
      expect(globMatch('😀 Kanji', '? Kanji')).toBe(true);
    });
  });

  describe('literals', () => {
    it('should match only the literal name', () => {
      expect(globMatch('Basic', 'Basic')).toBe(true);
      expect(globMatch('Basic (and reversed card)', 'Basic')).toBe(false);
      expect(globMatch('Basi', 'Basic')).toBe(false);
    });

    it('should be case-sensitive', () => {
      expect(globMatch('basic', 'Basic')).toBe(false);
      expect(globMatch('BASIC', 'Basic')).toBe(false);
    });

    it('should treat regex metacharacters literally', () => {
      expect(globMatch('Cloze (old)', 'Cloze (old)')).toBe(true);
      expect(globMatch('a.b', 'a.b')).toBe(true);
      expect(globMatch('axb', 'a.b')).toBe(false);
      expect(globMatch('1+1', '1+1')).toBe(true);
      expect(globMatch('$^', '$^')).toBe(true);
    });

    it('should match every literal name against itself', () => {
      fc.assert(
        fc.property(literalNameArb, (name) => {
          expect(globMatch(name, name)).toBe(true);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('character classes', () => {
    it('should match members of a set', () => {
      expect(globMatch('Deck A', 'Deck [AB]')).toBe(true);
      expect(globMatch('Deck B', 'Deck [AB]')).toBe(true);
      expect(globMatch('Deck C', 'Deck [AB]')).toBe(false);
    });

    it('should match ranges', () => {
      expect(globMatch('Level 3', 'Level [1-5]')).toBe(true);
      expect(globMatch('Level 7', 'Level [1-5]')).toBe(false);
    });

    it('should negate sets starting with an exclamation mark', () => {
      expect(globMatch('Deck C', 'Deck [!AB]')).toBe(true);
      expect(globMatch('Deck A', 'Deck [!AB]')).toBe(false);
    });

    it('should keep a leading closing bracket inside the set', () => {
      expect(globMatch(']', '[]]')).toBe(true);
      expect(globMatch('a', '[]a]')).toBe(true);
      expect(globMatch('b', '[]a]')).toBe(false);
    });

    it('should treat a caret as a literal member', () => {
      expect(globMatch('^', '[^a]')).toBe(true);
      expect(globMatch('b', '[^a]')).toBe(false);
    });

    it('should treat an unclosed bracket literally', () => {
      expect(globMatch('[abc', '[abc')).toBe(true);
      expect(globMatch('a', '[abc')).toBe(false);
    });

    it('should never match a reversed range', () => {
      expect(globMatch('m', '[z-a]')).toBe(false);
      expect(globMatch('z', '[z-a]')).toBe(false);
    });

    it('should match any character with a negated reversed range', () => {
      expect(globMatch('m', '[!z-a]')).toBe(true);
      expect(globMatch('mm', '[!z-a]')).toBe(false);
    });

    it('should drop only the reversed range of a class', () => {
      expect(globMatch('b', '[a-cz-a]')).toBe(true);
      expect(globMatch('m', '[a-cz-a]')).toBe(false);
      expect(globMatch('x', '[z-ax]')).toBe(true);
    });

    it('should treat hyphens at either end as members', () => {
      expect(globMatch('-', '[-a]')).toBe(true);
      expect(globMatch('-', '[a-]')).toBe(true);
      expect(globMatch('b', '[a-]')).toBe(false);
    });

    it('should match emoji members and ranges whole', () => {
      expect(globMatch('😀', '[😀]')).toBe(true);
      expect(globMatch('😁', '[😀]')).toBe(false);
      expect(globMatch('😁', '[😀-😂]')).toBe(true);
      expect(globMatch('Deck 😀', 'Deck [!a-z]')).toBe(true);
    });
  });

  describe('globToRegExp', () => {
    it('should anchor the expression', () => {
      expect(globToRegExp('Basic').source).toBe('^Basic$');
    });

    it('should collapse consecutive stars', () => {
      expect(globToRegExp('a**b').source).toBe('^a.*b$');
    });

    it('should reuse compiled patterns', () => {
      expect(globToRegExp('Deck *')).toBe(globToRegExp('Deck *'));
    });

    it('should evict the oldest pattern once the cache is full', () => {
      const first = globToRegExp('cache-first-*');
      for (let i = 0; i < MAX_CACHED_PATTERNS; i++) {
        globToRegExp(`cache-filler-${i}`);
      }

      expect(cachedPatternCount()).toBe(MAX_CACHED_PATTERNS);
      const recompiled = globToRegExp('cache-first-*');
      expect(recompiled).not.toBe(first);
      expect(recompiled.source).toBe(first.source);
    });
  });
});
