/**
 * Tag helpers
 * Tag names compare case-insensitively, as the host's tag search does.
 */

export function sameTag(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Check if a tag list contains a tag
 */
export function hasTag(tags: readonly string[], tag: string): boolean {
  return tags.some((existing) => sameTag(existing, tag));
}

/**
 * Return the tag list without any spelling of a tag
 */
export function withoutTag(tags: readonly string[], tag: string): string[] {
  return tags.filter((existing) => !sameTag(existing, tag));
}
