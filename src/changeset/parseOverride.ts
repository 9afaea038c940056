import type { OrderOverride } from "../order/types.js";

const HEADING = /^\s*(?:#{1,6}\s+)?(?:\*\*|__)?\s*(?:\w+\s+)*?review[\s-]*order\s*(?:\*\*|__)?\s*(?::\s*(.*?))?\s*(?:\*\*|__)?\s*$/i;
const LIST_ITEM = /^\s*(?:\d+[.)]|[-*+])\s+(.+)$/;
const NEXT_HEADING = /^\s*#{1,6}\s/;
const INLINE_SEPARATOR = /\s*(?:,|->|→|=>|;)\s*/;

function itemId(text: string): string | null {
  const ticked = text.match(/`([^`]+)`/);
  if (ticked) return ticked[1].trim();
  const first = text.trim().split(/\s+/)[0] ?? "";
  const id = first.replace(/[,;:]+$/, "");
  return id.length > 0 ? id : null;
}

/**
 * Extract an explicit review order from free text, e.g. a pull request body:
 *
 *   ## Review order
 *   1. `src/types.ts`
 *   2. src/service.ts — uses the new types
 *
 * or a single line `Review order: a.ts, b.ts -> c.ts`.
 * Returns undefined when the text has no review-order section.
 */
export function parseOverrideText(text: string): OrderOverride | undefined {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const start = lines.findIndex((l) => HEADING.test(l));
  if (start === -1) return undefined;

  const inline = (lines[start].match(HEADING)?.[1] ?? "").trim();
  if (inline.length > 0) {
    return inline
      .split(INLINE_SEPARATOR)
      .map(itemId)
      .filter((id): id is string => id !== null);
  }

  const ids: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (line.trim().length === 0) continue;
    if (NEXT_HEADING.test(line)) break;
    const item = line.match(LIST_ITEM);
    if (!item) {
      // indented continuation of the previous item
      if (ids.length > 0 && /^\s{2,}/.test(line)) continue;
      break;
    }
    const id = itemId(item[1]);
    if (id !== null) ids.push(id);
  }
  return ids;
}
