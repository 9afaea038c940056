import type { LayerHint } from "./types.js";

/** Presentation rank, lowest first. Never a hard ordering constraint. */
export const LAYER_ORDER: readonly LayerHint[] = [
  "data-structure",
  "config",
  "utility",
  "data-access",
  "business-logic",
  "orchestration",
  "entry-point",
  "test",
  "unknown",
];

const RANK = new Map<LayerHint, number>(LAYER_ORDER.map((l, i) => [l, i]));

export function layerRank(layer: LayerHint | undefined): number {
  return RANK.get(layer ?? "unknown") ?? LAYER_ORDER.length - 1;
}

export function isLayerHint(value: unknown): value is LayerHint {
  return typeof value === "string" && LAYER_ORDER.some((l) => l === value);
}
