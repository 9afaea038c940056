import type { NodeId } from "./types.js";

export type ResolutionErrorKind =
  | "UnknownReference"
  | "SelfDependency"
  | "DuplicateNode"
  | "InvalidNesting"
  | "InvalidOverride"
  | "InternalInvariantViolation";

export type ResolutionErrorDetail =
  | { kind: "UnknownReference"; missing: NodeId; edge?: { from: NodeId; to: NodeId }; node?: NodeId }
  | { kind: "SelfDependency"; node: NodeId }
  | { kind: "DuplicateNode"; node: NodeId }
  | { kind: "InvalidNesting"; chain: NodeId[] }
  | { kind: "InvalidOverride"; node: NodeId; reason: "unknown" | "duplicate" | "before_parent"; parent?: NodeId }
  | { kind: "InternalInvariantViolation"; invariant: string };

/** Caller errors can be corrected and retried; internal ones cannot. */
export const CALLER_ERROR_KINDS: ReadonlySet<ResolutionErrorKind> = new Set([
  "UnknownReference",
  "SelfDependency",
  "DuplicateNode",
  "InvalidNesting",
  "InvalidOverride",
]);

function describeDetail(detail: ResolutionErrorDetail): string {
  switch (detail.kind) {
    case "UnknownReference":
      if (detail.edge) {
        return `edge ${detail.edge.from} -> ${detail.edge.to} references unknown node "${detail.missing}"`;
      }
      return `node "${detail.node ?? ""}" has unknown parent "${detail.missing}"`;
    case "SelfDependency":
      return `node "${detail.node}" depends on itself`;
    case "DuplicateNode":
      return `node "${detail.node}" is declared more than once`;
    case "InvalidNesting":
      return `parent chain loops: ${detail.chain.join(" -> ")}`;
    case "InvalidOverride":
      if (detail.reason === "unknown") return `override names unknown node "${detail.node}"`;
      if (detail.reason === "duplicate") return `override names "${detail.node}" more than once`;
      return `override places "${detail.node}" before its parent "${detail.parent ?? ""}"`;
    case "InternalInvariantViolation":
      return `internal invariant violated: ${detail.invariant}`;
  }
}

export class ResolutionError extends Error {
  readonly kind: ResolutionErrorKind;
  readonly detail: ResolutionErrorDetail;

  constructor(detail: ResolutionErrorDetail) {
    super(`${detail.kind}: ${describeDetail(detail)}`);
    this.name = "ResolutionError";
    this.kind = detail.kind;
    this.detail = detail;
  }

  get isCallerError(): boolean {
    return CALLER_ERROR_KINDS.has(this.kind);
  }
}

export function internalViolation(invariant: string): ResolutionError {
  return new ResolutionError({ kind: "InternalInvariantViolation", invariant });
}
