export const CONTEXT_DELIMITER = "\n\n---\n\n";

/**
 * Join the first `topK` passage texts into one background block. Returns
 * `sentinel` when nothing survives. Scores and sources are left out.
 */
export function buildContext(
  ranked: readonly { text: string }[],
  topK: number,
  sentinel: string,
): string {
  const k = Math.min(topK, ranked.length);
  if (k <= 0) return sentinel;

  return ranked
    .slice(0, k)
    .map((entry) => entry.text)
    .join(CONTEXT_DELIMITER);
}
