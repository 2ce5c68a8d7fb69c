// Token-sort similarity — pure string functions, no I/O

/**
 * Lower-case, turn punctuation into spaces, collapse whitespace and trim.
 * Letters and digits of every script survive.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenSort(text: string): string {
  const normalized = normalize(text);
  if (!normalized) return "";
  return normalized.split(" ").sort().join(" ");
}

// Longest common subsequence over code points, two rolling rows.
function lcsLength(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] =
        a[i - 1] === b[j - 1]
          ? prev[j - 1] + 1
          : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/**
 * Insertion/deletion edit distance expressed as a 0..100 similarity:
 * round(100 * 2 * LCS / (|a| + |b|)). Either side empty scores 0.
 */
export function ratio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0 || right.length === 0) return 0;
  const common = lcsLength(left, right);
  return Math.round((200 * common) / (left.length + right.length));
}

/** Similarity of two strings with word order ignored. */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(tokenSort(a), tokenSort(b));
}
