/**
 * Shell-style glob matching for deck and note type names
 *
 * Supported syntax:
 * - `*` matches any sequence of characters, including the empty one
 * - `?` matches exactly one character
 * - `[abc]`, `[a-z]` match one character of the set, `[!abc]` one outside it
 *
 * Matching is case-sensitive and covers the whole name. An unclosed `[`
 * is taken literally. Up to MAX_CACHED_PATTERNS compiled patterns are
 * cached, oldest evicted first.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

const CLASS_SPECIAL = /[\\\]^-]/g;

const NEVER_MATCHES = '(?!)';

/** Compiled patterns kept before the oldest is evicted */
export const MAX_CACHED_PATTERNS = 256;

const compiledPatterns = new Map<string, RegExp>();

function escapeLiteral(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

function escapeClassMember(char: string): string {
  return char.replace(CLASS_SPECIAL, '\\$&');
}

/**
 * Translate the body of a bracket expression into a regex character class
 * Reversed ranges such as `z-a` are empty and dropped; a class left with
 * no members matches nothing (or any character, when negated).
 */
function translateClass(body: string): string {
  let negated = false;
  let members = body;
  if (members.startsWith('!')) {
    negated = true;
    members = members.slice(1);
  }

  // Code points, so astral characters stay whole
  const chars = Array.from(members);
  let translated = '';
  let i = 0;
  while (i < chars.length) {
    const start = chars[i];
    const end = chars[i + 2];
    if (chars[i + 1] === '-' && end !== undefined) {
      if ((start.codePointAt(0) ?? 0) <= (end.codePointAt(0) ?? 0)) {
        translated += `${escapeClassMember(start)}-${escapeClassMember(end)}`;
      }
      i += 3;
    } else {
      translated += escapeClassMember(start);
      i++;
    }
  }

  if (translated === '') {
    return negated ? '.' : NEVER_MATCHES;
  }
  return negated ? `[^${translated}]` : `[${translated}]`;
}

function remember(pattern: string, regex: RegExp): RegExp {
  if (compiledPatterns.size >= MAX_CACHED_PATTERNS) {
    const oldest = compiledPatterns.keys().next();
    if (!oldest.done) {
      compiledPatterns.delete(oldest.value);
    }
  }
  compiledPatterns.set(pattern, regex);
  return regex;
}

/**
 * Number of compiled patterns currently cached
 */
export function cachedPatternCount(): number {
  return compiledPatterns.size;
}

/**
 * Convert a glob pattern into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = compiledPatterns.get(pattern);
  if (cached) {
    return cached;
  }

  let source = '';
  let i = 0;
  const n = pattern.length;

  while (i < n) {
    const char = pattern[i];
    i++;

    if (char === '*') {
      // Collapse runs of stars
      while (pattern[i] === '*') i++;
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      let j = i;
      if (pattern[j] === '!') j++;
      // A leading ']' belongs to the set
      if (pattern[j] === ']') j++;
      while (j < n && pattern[j] !== ']') j++;

      if (j >= n) {
        source += '\\[';
      } else {
        source += translateClass(pattern.slice(i, j));
        i = j + 1;
      }
    } else {
      source += escapeLiteral(char);
    }
  }

  // Unicode mode: `?` and classes work on characters, not UTF-16 code units
  return remember(pattern, new RegExp(`^${source}$`, 'su'));
}

/**
 * Check whether a name matches a glob pattern
 */
export function globMatch(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}
