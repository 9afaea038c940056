/**
 * Change-set and resolution shapes. Identifiers are opaque; the resolver never
 * holds references into caller-owned objects, only ids and index maps.
 */

export type NodeId = string;

export type LayerHint =
  | "data-structure"
  | "config"
  | "utility"
  | "data-access"
  | "business-logic"
  | "orchestration"
  | "entry-point"
  | "test"
  | "unknown";

export interface ChangeNode {
  id: NodeId;
  /** Containing unit, e.g. the file of a symbol. Hard constraint: parent is presented first. */
  parent?: NodeId;
  /** Tie-break only. Missing → "unknown". */
  layer?: LayerHint;
}

/** `from` depends on `to` (imports, references or calls it). */
export interface ChangeEdge {
  from: NodeId;
  to: NodeId;
}

export type OrderOverride = readonly NodeId[];

export interface ChangeSet {
  nodes: readonly ChangeNode[];
  edges: readonly ChangeEdge[];
  override?: OrderOverride;
}

/**
 * For a cycle group, `parent` is the first member's parent: the children of a
 * group are ordered together, so a nested group can span several parents.
 */
export type OrderEntry =
  | { kind: "node"; id: NodeId; parent: NodeId | null }
  | { kind: "cycle"; members: NodeId[]; parent: NodeId | null };

export interface OverrideContradiction {
  dependent: NodeId;
  dependency: NodeId;
}

export interface OverrideReport {
  applied: boolean;
  /** Ids taken verbatim from the override, in override order. */
  named: NodeId[];
  contradictions: OverrideContradiction[];
  contradicted: boolean;
}

export interface Resolution {
  order: NodeId[];
  entries: OrderEntry[];
  /** Members of every cycle group, in output order. */
  cycles: NodeId[][];
  override: OverrideReport;
}
