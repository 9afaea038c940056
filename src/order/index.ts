export { resolveOrder, tryResolveOrder, type ResolveOutcome } from "./resolve.js";
export { dropInvalidEdges, type DroppedEdge } from "./sanitize.js";
export { ResolutionError, CALLER_ERROR_KINDS } from "./errors.js";
export type { ResolutionErrorDetail, ResolutionErrorKind } from "./errors.js";
export { LAYER_ORDER, isLayerHint, layerRank } from "./layers.js";
export type {
  ChangeEdge,
  ChangeNode,
  ChangeSet,
  LayerHint,
  NodeId,
  OrderEntry,
  OrderOverride,
  OverrideContradiction,
  OverrideReport,
  Resolution,
} from "./types.js";
