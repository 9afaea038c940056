import { readFileSync } from "fs";
import { isAbsolute, normalize, resolve, sep } from "path";

/**
 * Normalize path separators to forward slashes for deterministic cross-platform output.
 */
export function normalizeSeparators(p: string): string {
  return normalize(p).split(sep).join("/");
}

/**
 * Repo-relative, forward slashes, `.` and `..` collapsed, no trailing slash.
 * Case is preserved (Linux is case-sensitive). Returns null outside the root.
 */
export function toRepoRelative(path: string, repoRoot: string): string | null {
  const absRoot = normalizeSeparators(resolve(repoRoot));
  const abs = normalizeSeparators(isAbsolute(path) ? path : resolve(repoRoot, path));
  if (abs === absRoot) return null;
  if (!abs.startsWith(absRoot.endsWith("/") ? absRoot : absRoot + "/")) return null;
  const rel = abs.slice(absRoot.length).replace(/^\//, "").replace(/\/$/, "");
  return rel.length > 0 ? rel : null;
}

/** File text with line endings and Unicode normalized; null when unreadable. */
export function readSourceText(absPath: string): string | null {
  try {
    return readFileSync(absPath, { encoding: "utf8" })
      .replace(/\r\n/g, "\n")
      .replace(/\r/g, "\n")
      .normalize("NFC");
  } catch {
    return null;
  }
}
