// String utility functions
// Name matching and text processing

/**
 * Match a player-typed term against known names.
 * Exact (case-insensitive) first, then a name containing the term (or a term
 * containing the whole name as words), then the closest name by similarity
 * ratio above the threshold.
 */
export function matchName(term: string, names: Iterable<string>, threshold = 0.75): string | null {
  const query = term.trim().toLowerCase();
  if (!query) return null;

  const candidates = [...names];
  const exact = candidates.find((name) => name.toLowerCase() === query);
  if (exact !== undefined) return exact;

  const partial = candidates.filter((name) => {
    const lower = name.toLowerCase();
    return lower.includes(query) || ` ${query} `.includes(` ${lower} `);
  });
  if (partial.length === 1) return partial[0];
  if (partial.length > 1) {
    // prefer the shortest name containing the query ("sword" -> "sword" over "sword belt")
    return [...partial].sort((a, b) => a.length - b.length || a.localeCompare(b))[0];
  }

  let best: { name: string; ratio: number } | null = null;
  for (const name of candidates) {
    const ratio = calculateSimilarity(query, name.toLowerCase());
    if (ratio >= threshold && (best === null || ratio > best.ratio)) {
      best = { name, ratio };
    }
  }
  return best?.name ?? null;
}

/**
 * Calculate similarity ratio between two strings
 * 2 * LCS / (len1 + len2)
 */
export function calculateSimilarity(str1: string, str2: string): number {
  if (str1.length === 0 && str2.length === 0) return 1;
  if (str1.length === 0 || str2.length === 0) return 0;

  const m = str1.length;
  const n = str2.length;
  let previous: number[] = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= m; i++) {
    const current: number[] = new Array<number>(n + 1).fill(0);
    for (let j = 1; j <= n; j++) {
      current[j] =
        str1[i - 1] === str2[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }

  return (2 * previous[n]) / (m + n);
}

/**
 * Truncate text to a maximum length with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Convert text to title case
 */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * "a, b and c"
 */
export function joinList(items: readonly string[]): string {
  if (items.length === 0) return '';
  if (items.length === 1) return items[0];
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
