/**
 * Classify a changed file into a layer hint from its path tokens.
 * Tests win over everything, declaration files are data structures, then the
 * first match in TOKEN_LAYERS order, then entry-point basenames.
 */

import type { LayerHint } from "../order/types.js";

const TEST_TOKENS = ["test", "tests", "spec", "specs", "e2e", "fixture", "fixtures", "mock", "mocks", "stories"];
const CONFIG_TOKENS = ["config", "configs", "configuration", "settings", "env", "constants"];
const DATA_STRUCTURE_TOKENS = [
  "types",
  "type",
  "typings",
  "model",
  "models",
  "schema",
  "schemas",
  "entity",
  "entities",
  "interfaces",
  "dto",
  "dtos",
  "enums",
];
const UTILITY_TOKENS = ["util", "utils", "utility", "utilities", "helper", "helpers", "lib", "common", "shared"];
const DATA_ACCESS_TOKENS = [
  "db",
  "database",
  "repository",
  "repositories",
  "repo",
  "dao",
  "store",
  "stores",
  "storage",
  "query",
  "queries",
  "migration",
  "migrations",
  "cache",
  "client",
  "clients",
];
const BUSINESS_LOGIC_TOKENS = ["service", "services", "domain", "core", "logic", "usecase", "usecases", "rules", "engine"];
const ORCHESTRATION_TOKENS = [
  "controller",
  "controllers",
  "handler",
  "handlers",
  "route",
  "routes",
  "router",
  "middleware",
  "workflow",
  "workflows",
  "job",
  "jobs",
  "resolver",
  "resolvers",
  "api",
];
const ENTRY_BASENAMES = new Set(["index", "main", "server", "app", "cli"]);

const TOKEN_LAYERS: readonly [LayerHint, readonly string[]][] = [
  ["config", CONFIG_TOKENS],
  ["data-structure", DATA_STRUCTURE_TOKENS],
  ["utility", UTILITY_TOKENS],
  ["data-access", DATA_ACCESS_TOKENS],
  ["business-logic", BUSINESS_LOGIC_TOKENS],
  ["orchestration", ORCHESTRATION_TOKENS],
];

export type LayerTokens = Partial<Record<LayerHint, readonly string[]>>;

/** Split a path into lowercase tokens on separators, dots and camelCase humps. */
export function pathTokens(path: string): string[] {
  return path
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[\s/\\._\-#]+/)
    .filter((t) => t.length > 0);
}

function basenameOf(path: string): string {
  const file = path.split("/").pop() ?? path;
  const dot = file.indexOf(".");
  return (dot > 0 ? file.slice(0, dot) : file).toLowerCase();
}

export function inferLayerHint(path: string, extraTokens: LayerTokens = {}): LayerHint {
  const tokens = new Set(pathTokens(path));
  const matches = (layer: LayerHint, builtin: readonly string[]) =>
    builtin.some((t) => tokens.has(t)) || (extraTokens[layer] ?? []).some((t) => tokens.has(t.toLowerCase()));

  if (matches("test", TEST_TOKENS)) return "test";
  if (path.endsWith(".d.ts")) return "data-structure";
  for (const [layer, builtin] of TOKEN_LAYERS) {
    if (matches(layer, builtin)) return layer;
  }
  if (ENTRY_BASENAMES.has(basenameOf(path)) || matches("entry-point", ["bin"])) {
    return "entry-point";
  }
  return "unknown";
}
