const SHORTHAND: ReadonlyArray<[RegExp, string]> = [
  [/\bfeat\b\.?/g, 'featuring'],
  [/\bft\b\.?/g, 'featuring'],
  [/\bw\//g, 'with '],
  [/\bvs\b\.?/g, 'versus'],
];

/**
 * Canonical form used on both sides of every comparison: accents folded,
 * lowercase, music shorthand expanded, punctuation and separators turned
 * into single spaces.
 */
export function normalizeText(text: string): string {
  let out = text.normalize('NFKD').replace(/\p{M}/gu, '').toLowerCase();
  for (const [pattern, replacement] of SHORTHAND) {
    out = out.replace(pattern, replacement);
  }
  return out
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}
