/** First `@agent <instruction>`; the instruction runs to the end of its line. */
const MENTION_PATTERN = /@agent\s+(.+?)(?:\n|$)/i;

/**
 * Instruction following the first `@agent` mention, trimmed, or undefined.
 */
export function extractMention(text: string | undefined): string | undefined {
  if (!text) {
    return undefined;
  }
  const instruction = MENTION_PATTERN.exec(text)?.[1]?.trim();
  return instruction ? instruction : undefined;
}

export function hasMention(...texts: Array<string | undefined>): boolean {
  return texts.some((text) => extractMention(text) !== undefined);
}

/**
 * Labels travel in metadata as one comma-joined string.
 */
export function joinLabels(labels: readonly string[]): string {
  return labels.join(',');
}

export function splitLabels(joined: string | undefined): string[] {
  if (!joined) {
    return [];
  }
  return joined
    .split(',')
    .map((label) => label.trim().toLowerCase())
    .filter((label) => label.length > 0);
}

export function hasAllowedLabel(joined: string | undefined, allowList: Iterable<string>): boolean {
  const allowed = new Set([...allowList].map((label) => label.toLowerCase()));
  return splitLabels(joined).some((label) => allowed.has(label));
}
