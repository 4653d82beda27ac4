/**
 * Token-set similarity in [0, 1]. Both inputs are case-folded, stripped of
 * diacritics and punctuation, and split on whitespace; the score is the best
 * indel ratio among the shared-token core and each side's full token set.
 * Symmetric, and identical inputs always score 1. Inputs with nothing
 * comparable left after normalization score 0 unless they are identical.
 */
export function normalizeForSimilarity(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/** 1 - indel distance / combined length. */
export function indelRatio(a: string, b: string): number {
  if (a === b) return 1;
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / total;
}

function joinSorted(tokens: Iterable<string>): string {
  return [...tokens].sort().join(' ');
}

export function tokenSetRatio(left: string, right: string): number {
  if (left === right) return 1;
  const a = normalizeForSimilarity(left);
  const b = normalizeForSimilarity(right);
  if (a === '' || b === '') return 0;
  if (a === b) return 1;

  const tokensA = new Set(a.split(' '));
  const tokensB = new Set(b.split(' '));
  const shared = [...tokensA].filter((t) => tokensB.has(t));
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t));
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t));

  const core = joinSorted(shared);
  const withA = [core, joinSorted(onlyA)].filter(Boolean).join(' ');
  const withB = [core, joinSorted(onlyB)].filter(Boolean).join(' ');

  const candidates = [indelRatio(withA, withB)];
  if (core !== '') {
    candidates.push(indelRatio(core, withA), indelRatio(core, withB));
  }
  return Math.max(...candidates);
}
