/**
 * Edit Distance - Levenshtein distance over Unicode code points
 *
 * Used by the annotation scanner to flag comments that are probably a
 * misspelled annotation.
 */

/**
 * Minimum number of single code point insertions, deletions and
 * substitutions that turn `a` into `b`.
 *
 * Keeps two rows of the dynamic programming table. The shorter operand sets
 * the row width, so memory is O(min(|a|, |b|)).
 */
export function levenshteinDistance(a: string, b: string): number {
  let longer = Array.from(a);
  let shorter = Array.from(b);
  if (longer.length < shorter.length) {
    [longer, shorter] = [shorter, longer];
  }

  let previous: number[] = [];
  for (let j = 0; j <= shorter.length; j++) {
    previous.push(j);
  }

  for (let i = 0; i < longer.length; i++) {
    const current: number[] = [i + 1];

    for (let j = 0; j < shorter.length; j++) {
      const insertion = (previous[j + 1] ?? 0) + 1;
      const deletion = (current[j] ?? 0) + 1;
      const substitution = (previous[j] ?? 0) + (longer[i] === shorter[j] ? 0 : 1);
      current.push(Math.min(insertion, deletion, substitution));
    }

    previous = current;
  }

  return previous[shorter.length] ?? 0;
}

/**
 * Candidates whose distance to `input` is at most `maxDistance`, in the
 * order given.
 */
export function closestMatches<T extends string>(
  input: string,
  candidates: readonly T[],
  maxDistance: number
): T[] {
  return candidates.filter((candidate) => levenshteinDistance(input, candidate) <= maxDistance);
}
