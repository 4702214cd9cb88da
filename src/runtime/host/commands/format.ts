const MENTION_PATTERN = /<@!?(\d+)>/g;

export type Conjunction = "and" | "or";

/** `A`, `A and B`, `A, B, and C`. */
export function joinWithConjunction(items: readonly string[], conj: Conjunction): string {
  if (items.length === 0) {
    throw new Error("joinWithConjunction needs at least one item");
  }
  if (items.length === 1) {
    return items[0];
  }
  if (items.length === 2) {
    return `${items[0]} ${conj} ${items[1]}`;
  }
  return `${items.slice(0, -1).join(", ")}, ${conj} ${items[items.length - 1]}`;
}

export function dedupPreserveOrder<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}

export function mention(userId: string): string {
  return `<@${userId}>`;
}

export function extractMentionIds(text: string): string[] {
  return Array.from(text.matchAll(MENTION_PATTERN), (match) => match[1]);
}

export function renderReply(primaryId: string, extraIds: readonly string[], body: string): string {
  const prefix = dedupPreserveOrder([primaryId, ...extraIds])
    .map(mention)
    .join(" ");
  const separator = body.includes("\n") ? "\n" : " ";
  return `${prefix}${separator}${body}`;
}
