/**
 * .review-order.yml loader (v1, frozen schema).
 * Only change-set construction reads this; the resolver itself takes no config.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import type { LayerTokens } from "../changeset/layerHint.js";
import { isLayerHint } from "../order/layers.js";

export const CONFIG_FILE = ".review-order.yml";

const ALLOWED_KEYS = new Set(["granularity", "ignore", "maxFiles", "includeTypeImports", "layers"]);
const DEFAULT_MAX_FILES = 400;
const MIN_MAX_FILES = 1;
const MAX_MAX_FILES = 10000;

export type Granularity = "file" | "symbol";

export interface ReviewOrderConfig {
  granularity: Granularity;
  /** Repo-relative path prefixes left out of the change-set. */
  ignore: string[];
  maxFiles: number;
  includeTypeImports: boolean;
  layers: LayerTokens;
}

export function defaultConfig(): ReviewOrderConfig {
  return { granularity: "file", ignore: [], maxFiles: DEFAULT_MAX_FILES, includeTypeImports: true, layers: {} };
}

function fail(message: string): never {
  throw new Error(`${CONFIG_FILE}: ${message}`);
}

function readLayers(value: unknown): LayerTokens {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    fail("layers must be a map from layer name to a list of path tokens");
  }
  const layers: LayerTokens = {};
  for (const [layer, tokens] of Object.entries(value)) {
    if (!isLayerHint(layer)) fail(`layers: unknown layer "${layer}"`);
    if (!Array.isArray(tokens) || tokens.some((t) => typeof t !== "string" || t.length === 0)) {
      fail(`layers.${layer} must be an array of non-empty strings`);
    }
    layers[layer] = tokens.map(String);
  }
  return layers;
}

/**
 * Load and validate .review-order.yml from repository root.
 * Unknown keys or invalid values → throw (caller exits 2).
 * Missing file → defaults.
 */
export function loadReviewOrderConfig(repoRoot: string): ReviewOrderConfig {
  const path = join(repoRoot, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    fail(`invalid YAML — ${msg}`);
  }

  // an empty file parses to null
  if (raw === null || raw === undefined) return defaultConfig();
  if (typeof raw !== "object" || Array.isArray(raw)) fail("root must be an object");

  const obj: Record<string, unknown> = { ...raw };
  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) fail(`unknown key "${key}" (v1 schema is frozen)`);
  }

  const config = defaultConfig();

  if (obj.granularity !== undefined) {
    if (obj.granularity !== "file" && obj.granularity !== "symbol") {
      fail("granularity must be file or symbol");
    }
    config.granularity = obj.granularity;
  }

  if (obj.ignore !== undefined) {
    if (!Array.isArray(obj.ignore)) fail("ignore must be an array of path prefixes");
    obj.ignore.forEach((v: unknown, i: number) => {
      if (typeof v !== "string") fail(`ignore[${i}] must be a string`);
      config.ignore.push(v);
    });
  }

  if (obj.maxFiles !== undefined) {
    const n = Number(obj.maxFiles);
    if (!Number.isInteger(n) || n < MIN_MAX_FILES || n > MAX_MAX_FILES) {
      fail(`maxFiles must be an integer between ${MIN_MAX_FILES} and ${MAX_MAX_FILES}`);
    }
    config.maxFiles = n;
  }

  if (obj.includeTypeImports !== undefined) {
    if (typeof obj.includeTypeImports !== "boolean") fail("includeTypeImports must be true or false");
    config.includeTypeImports = obj.includeTypeImports;
  }

  if (obj.layers !== undefined) config.layers = readLayers(obj.layers);

  return config;
}
