const LIKE_SPECIAL_CHARACTERS = /[\\%_]/g;

/** Wraps a query in `%` wildcards, escaping the wildcards it already contains. */
export function toLikePattern(query: string): string {
  return `%${query.replace(LIKE_SPECIAL_CHARACTERS, (character) => `\\${character}`)}%`;
}

export function containsIgnoringCase(value: string | null, query: string): boolean {
  if (value === null) {
    return false;
  }

  return value.toLowerCase().includes(query.toLowerCase());
}
