import { join, resolve } from "path";
import { defaultConfig, type Granularity, type ReviewOrderConfig } from "../config/reviewOrderYaml.js";
import { sortIds } from "../determinism/CanonicalOrder.js";
import { readSourceText, toRepoRelative } from "../fs/pathUtils.js";
import type { ChangeEdge, ChangeNode, ChangeSet, NodeId } from "../order/types.js";
import { inferLayerHint } from "./layerHint.js";
import { parseModule, type ModuleInfo } from "./parseModule.js";
import { resolveImport } from "./resolveImport.js";

const PARSEABLE = /\.(ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;

export interface BuildChangeSetOptions {
  repoRoot: string;
  /** Changed files, repo-relative or absolute. */
  files: readonly string[];
  config?: ReviewOrderConfig;
  /** Overrides config.granularity. */
  granularity?: Granularity;
}

export type SkipReason = "outside_root" | "ignored" | "over_limit";

export interface BuiltChangeSet {
  changeSet: ChangeSet;
  skipped: { path: string; reason: SkipReason }[];
  /** Kept as nodes without edges (e.g. deleted in the change). */
  unreadable: string[];
}

export function symbolId(file: string, name: string): NodeId {
  return `${file}#${name}`;
}

function isIgnored(path: string, prefixes: readonly string[]): boolean {
  return prefixes.some((p) => {
    const prefix = p.replace(/^\.\//, "").replace(/\/$/, "");
    return path === prefix || path.startsWith(prefix + "/");
  });
}

function addEdge(edges: Map<string, ChangeEdge>, from: NodeId, to: NodeId): void {
  if (from === to) return;
  edges.set(`${from}\u0000${to}`, { from, to });
}

function symbolEdges(
  file: string,
  info: ModuleInfo,
  modules: Map<string, ModuleInfo>,
  fileSet: ReadonlySet<string>,
  includeTypeImports: boolean,
  edges: Map<string, ChangeEdge>,
): void {
  const local = new Set(info.declarations.map((d) => d.name));
  const imported = new Map<string, { target: string; name: string }>();
  for (const rec of info.imports) {
    if (rec.typeOnly && !includeTypeImports) continue;
    const target = resolveImport(file, rec.specifier, fileSet);
    if (target === null) continue;
    for (const b of rec.bindings) imported.set(b.local, { target, name: b.imported });
  }

  for (const decl of info.declarations) {
    const from = symbolId(file, decl.name);
    for (const ref of decl.references) {
      if (local.has(ref)) {
        addEdge(edges, from, symbolId(file, ref));
        continue;
      }
      const binding = imported.get(ref);
      if (!binding) continue;
      const targetDecls = modules.get(binding.target)?.declarations ?? [];
      const declared = binding.name !== "*" && targetDecls.some((d) => d.name === binding.name);
      addEdge(edges, from, declared ? symbolId(binding.target, binding.name) : binding.target);
    }
  }
}

/**
 * Derive a change-set from changed source files: one node per file, edges from
 * relative imports between changed files. With symbol granularity every
 * top-level declaration becomes a child node of its file.
 */
export function buildChangeSet(options: BuildChangeSetOptions): BuiltChangeSet {
  const config = options.config ?? defaultConfig();
  const granularity = options.granularity ?? config.granularity;
  const absRoot = resolve(options.repoRoot);
  const skipped: BuiltChangeSet["skipped"] = [];

  const candidates = new Set<string>();
  for (const f of options.files) {
    const rel = toRepoRelative(f, absRoot);
    if (rel === null) {
      skipped.push({ path: f, reason: "outside_root" });
    } else if (isIgnored(rel, config.ignore)) {
      skipped.push({ path: rel, reason: "ignored" });
    } else {
      candidates.add(rel);
    }
  }

  const sorted = sortIds(candidates);
  const files = sorted.slice(0, config.maxFiles);
  for (const path of sorted.slice(config.maxFiles)) skipped.push({ path, reason: "over_limit" });
  const fileSet = new Set(files);

  const modules = new Map<string, ModuleInfo>();
  const unreadable: string[] = [];
  for (const file of files) {
    const text = readSourceText(join(absRoot, file));
    if (text === null) {
      unreadable.push(file);
    } else if (PARSEABLE.test(file)) {
      modules.set(file, parseModule(file, text));
    }
  }

  const nodes: ChangeNode[] = [];
  const edges = new Map<string, ChangeEdge>();
  for (const file of files) {
    const layer = inferLayerHint(file, config.layers);
    nodes.push({ id: file, layer });

    const info = modules.get(file);
    if (!info) continue;

    for (const rec of info.imports) {
      if (rec.typeOnly && !config.includeTypeImports) continue;
      const target = resolveImport(file, rec.specifier, fileSet);
      if (target !== null) addEdge(edges, file, target);
    }

    if (granularity === "symbol") {
      for (const decl of info.declarations) {
        nodes.push({
          id: symbolId(file, decl.name),
          parent: file,
          layer: decl.kind === "type" && layer !== "test" ? "data-structure" : layer,
        });
      }
      symbolEdges(file, info, modules, fileSet, config.includeTypeImports, edges);
    }
  }

  return {
    changeSet: { nodes, edges: [...edges.values()] },
    skipped,
    unreadable,
  };
}
