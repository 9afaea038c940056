import { posix } from "path";

const SOURCE_SUFFIXES = ["", ".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
const INDEX_SUFFIXES = ["/index.ts", "/index.tsx", "/index.js", "/index.jsx"];
const JS_TO_TS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

function candidates(target: string): string[] {
  const out = [...SOURCE_SUFFIXES.map((s) => target + s), ...INDEX_SUFFIXES.map((s) => target + s)];
  const ext = posix.extname(target);
  const mapped = JS_TO_TS[ext];
  if (mapped) {
    const stem = target.slice(0, -ext.length);
    out.splice(1, 0, ...mapped.map((m) => stem + m));
  }
  return out;
}

/**
 * Resolve a relative specifier written in `fromFile` to one of `files`
 * (repo-relative, forward slashes). Bare and absolute specifiers, and targets
 * outside the change-set, resolve to null.
 */
export function resolveImport(fromFile: string, specifier: string, files: ReadonlySet<string>): string | null {
  if (!specifier.startsWith("./") && !specifier.startsWith("../") && specifier !== "." && specifier !== "..") {
    return null;
  }
  const target = posix.normalize(posix.join(posix.dirname(fromFile), specifier)).replace(/\/$/, "");
  if (target === ".." || target.startsWith("../")) return null;

  for (const candidate of candidates(target)) {
    const rel = candidate.replace(/^\.\//, "");
    if (files.has(rel)) return rel;
  }
  return null;
}
