import { readFileSync } from "fs";
import { extname } from "path";
import { parse } from "yaml";
import { isLayerHint } from "../order/layers.js";
import type { ChangeEdge, ChangeNode, ChangeSet } from "../order/types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readNode(path: string, value: unknown, i: number): ChangeNode {
  if (typeof value === "string") return { id: value };
  if (!isRecord(value)) throw new Error(`${path}: nodes[${i}] must be a string or an object`);
  if (typeof value.id !== "string") throw new Error(`${path}: nodes[${i}].id must be a string`);
  const node: ChangeNode = { id: value.id };
  if (value.parent !== undefined && value.parent !== null) {
    if (typeof value.parent !== "string") throw new Error(`${path}: nodes[${i}].parent must be a string`);
    node.parent = value.parent;
  }
  if (value.layer !== undefined) {
    if (!isLayerHint(value.layer)) throw new Error(`${path}: nodes[${i}].layer is not a known layer`);
    node.layer = value.layer;
  }
  return node;
}

function readEdge(path: string, value: unknown, i: number): ChangeEdge {
  if (Array.isArray(value) && value.length === 2 && typeof value[0] === "string" && typeof value[1] === "string") {
    return { from: value[0], to: value[1] };
  }
  if (isRecord(value) && typeof value.from === "string" && typeof value.to === "string") {
    return { from: value.from, to: value.to };
  }
  throw new Error(`${path}: edges[${i}] must be { from, to } or a [from, to] pair`);
}

/** Shape check only; graph validation belongs to the resolver. */
export function parseChangeSet(path: string, raw: unknown): ChangeSet {
  if (!isRecord(raw)) throw new Error(`${path}: root must be an object`);
  if (!Array.isArray(raw.nodes)) throw new Error(`${path}: nodes must be an array`);
  const edgesRaw = raw.edges ?? [];
  if (!Array.isArray(edgesRaw)) throw new Error(`${path}: edges must be an array`);

  const changeSet: ChangeSet = {
    nodes: raw.nodes.map((n: unknown, i: number) => readNode(path, n, i)),
    edges: edgesRaw.map((e: unknown, i: number) => readEdge(path, e, i)),
  };

  if (raw.override !== undefined && raw.override !== null) {
    const override = raw.override;
    if (!Array.isArray(override) || override.some((id) => typeof id !== "string")) {
      throw new Error(`${path}: override must be an array of node ids`);
    }
    changeSet.override = override.map(String);
  }
  return changeSet;
}

/** Read a change-set from .json, .yml or .yaml. */
export function loadChangeSetFile(path: string): ChangeSet {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: cannot read change-set — ${msg}`);
  }

  const ext = extname(path).toLowerCase();
  const isYaml = ext === ".yml" || ext === ".yaml";
  let raw: unknown;
  try {
    raw = isYaml ? parse(content) : JSON.parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: invalid ${isYaml ? "YAML" : "JSON"} — ${msg}`);
  }
  return parseChangeSet(path, raw);
}
