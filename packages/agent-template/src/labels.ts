/**
 * Split a whitespace-separated label expression into its tokens
 *
 * Duplicates collapse; insertion order is kept.
 */
export function parseLabelTokens(label: string | undefined): Set<string> {
  if (label === undefined) {
    return new Set();
  }
  return new Set(label.split(/\s+/).filter((token) => token.length > 0));
}
