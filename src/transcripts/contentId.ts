const ID_PATTERNS: RegExp[] = [
  /(?:v=|\/videos\/|embed\/|shorts\/|youtu\.be\/|\/v\/|\/e\/|watch\?v=)([0-9A-Za-z_-]{11})/,
  /^([0-9A-Za-z_-]{11})$/,
];

/**
 * Pull the 11-character video id out of a watch/short/embed URL, or accept a bare id.
 * Returns null when nothing matches.
 */
export function extractContentId(input: string): string | null {
  const value = input.trim();
  for (const pattern of ID_PATTERNS) {
    const match = pattern.exec(value);
    if (match?.[1]) return match[1];
  }
  return null;
}
