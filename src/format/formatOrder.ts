import type { NodeId, Resolution } from "../order/types.js";

const INDENT = "  ";

/**
 * Plain-text review order: numbered nodes, nested units indented under their
 * parent, cycle groups introduced by a `cycle:` line.
 */
export function formatOrder(resolution: Resolution): string {
  const depthOf = new Map<NodeId, number>();
  const depth = (parent: NodeId | null) => (parent === null ? 0 : (depthOf.get(parent) ?? -1) + 1);
  const lines: string[] = [];
  let n = 0;

  for (const entry of resolution.entries) {
    const d = depth(entry.parent);
    const pad = INDENT.repeat(d);
    if (entry.kind === "cycle") {
      lines.push(`${pad}cycle: ${entry.members.join(" <-> ")}`);
    }
    const ids = entry.kind === "node" ? [entry.id] : entry.members;
    for (const id of ids) {
      depthOf.set(id, d);
      n++;
      lines.push(`${pad}${n}. ${id}`);
    }
  }

  if (resolution.override.applied) {
    lines.push("");
    lines.push(`override: ${resolution.override.named.length} named, ${resolution.order.length - resolution.override.named.length} computed`);
  }
  if (resolution.override.contradicted) {
    lines.push("override contradicts dependency:");
    for (const c of resolution.override.contradictions) {
      lines.push(`${INDENT}${c.dependent} is listed before its dependency ${c.dependency}`);
    }
  }

  return lines.join("\n");
}
