export * from "./order/index.js";
export { buildChangeSet, symbolId, type BuildChangeSetOptions, type BuiltChangeSet } from "./changeset/buildChangeSet.js";
export { inferLayerHint, type LayerTokens } from "./changeset/layerHint.js";
export { loadChangeSetFile, parseChangeSet } from "./changeset/loadChangeSet.js";
export { parseOverrideText } from "./changeset/parseOverride.js";
export { loadReviewOrderConfig, defaultConfig, type Granularity, type ReviewOrderConfig } from "./config/reviewOrderYaml.js";
export { formatOrder } from "./format/formatOrder.js";
export { serializeResolution } from "./determinism/StableJson.js";
