/**
 * Sentence splitting for read-aloud input.
 *
 * Line breaks inside a page are treated as spaces, then the text is cut on
 * every period. Each non-blank fragment becomes one sentence ending in ".".
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/\r?\n/g, ' ')
    .split('.')
    .map((s) => s.replace(/\s+/g, ' ').trim())
    .filter((s) => s.length > 0)
    .map((s) => `${s}.`);
}
