export const ELLIPSIS = '...';

/**
 * Cuts `text` to `maxLength` code points and appends an ellipsis when it
 * was longer. Surrogate pairs are never split.
 */
export function truncateText(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return text;
  }
  return codePoints.slice(0, maxLength).join('') + ELLIPSIS;
}
