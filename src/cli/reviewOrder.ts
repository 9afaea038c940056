/**
 * review-order CLI. Prints the presentation order of a change-set.
 * Exit 0 on success, 2 on caller errors, 3 on internal invariant violations.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { buildChangeSet } from "../changeset/buildChangeSet.js";
import { loadChangeSetFile } from "../changeset/loadChangeSet.js";
import { parseOverrideText } from "../changeset/parseOverride.js";
import { loadReviewOrderConfig, type Granularity } from "../config/reviewOrderYaml.js";
import { serializeResolution } from "../determinism/StableJson.js";
import { formatOrder } from "../format/formatOrder.js";
import { dropInvalidEdges } from "../order/sanitize.js";
import { tryResolveOrder } from "../order/resolve.js";
import type { ChangeSet } from "../order/types.js";

export const EXIT_OK = 0;
export const EXIT_CALLER_ERROR = 2;
export const EXIT_INTERNAL_ERROR = 3;

const USAGE = [
  "usage: review-order --changeset <file.json|file.yml> [options]",
  "       review-order --root <dir> <file>... [options]",
  "options:",
  "  --override-file <file>      free text with a \"Review order\" section",
  "  --granularity file|symbol   node granularity for --root (default from .review-order.yml)",
  "  --drop-invalid-edges        drop self and unknown edges instead of failing",
  "  --json                      print the resolution as JSON",
].join("\n");

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CliArgs {
  changeset: string | null;
  root: string | null;
  files: string[];
  overrideFile: string | null;
  granularity: Granularity | null;
  dropInvalidEdges: boolean;
  json: boolean;
}

/** Parse argv (without node and script). Throws Error on bad usage. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    changeset: null,
    root: null,
    files: [],
    overrideFile: null,
    granularity: null,
    dropInvalidEdges: false,
    json: false,
  };

  const value = (i: number, flag: string): string => {
    const v = argv[i + 1];
    if (v === undefined || v.startsWith("--")) throw new Error(`${flag} needs a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--changeset") {
      args.changeset = value(i++, arg);
    } else if (arg === "--root") {
      args.root = value(i++, arg);
    } else if (arg === "--override-file") {
      args.overrideFile = value(i++, arg);
    } else if (arg === "--granularity") {
      const g = value(i++, arg);
      if (g !== "file" && g !== "symbol") throw new Error("--granularity must be file or symbol");
      args.granularity = g;
    } else if (arg === "--drop-invalid-edges") {
      args.dropInvalidEdges = true;
    } else if (arg === "--json") {
      args.json = true;
    } else if (arg.startsWith("--")) {
      throw new Error(`unknown option ${arg}`);
    } else {
      args.files.push(arg);
    }
  }

  if ((args.changeset === null) === (args.root === null)) {
    throw new Error("exactly one of --changeset or --root is required");
  }
  if (args.changeset !== null && args.files.length > 0) {
    throw new Error("file arguments are only accepted with --root");
  }
  return args;
}

function loadInput(args: CliArgs, io: CliIO): ChangeSet {
  if (args.changeset !== null) return loadChangeSetFile(resolve(args.changeset));

  const root = resolve(args.root ?? ".");
  const config = loadReviewOrderConfig(root);
  const built = buildChangeSet({
    repoRoot: root,
    files: args.files,
    config,
    granularity: args.granularity ?? undefined,
  });
  for (const s of built.skipped) io.err(`review-order: skipped ${s.path} (${s.reason})`);
  for (const path of built.unreadable) io.err(`review-order: ${path} is unreadable; kept without dependencies`);
  return built.changeSet;
}

function readOverride(path: string): readonly string[] | undefined {
  let text: string;
  try {
    text = readFileSync(resolve(path), "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: cannot read override — ${msg}`);
  }
  return parseOverrideText(text);
}

export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    io.err(`review-order: ${err instanceof Error ? err.message : String(err)}`);
    io.err(USAGE);
    return EXIT_CALLER_ERROR;
  }

  let changeSet: ChangeSet;
  try {
    changeSet = loadInput(args, io);

    if (args.overrideFile !== null) {
      const override = readOverride(args.overrideFile);
      if (override === undefined) {
        io.err(`review-order: no review order section in ${args.overrideFile}; using computed order`);
      } else {
        changeSet = { ...changeSet, override };
      }
    }
  } catch (err) {
    io.err(`review-order: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_CALLER_ERROR;
  }

  if (args.dropInvalidEdges) {
    const sanitized = dropInvalidEdges(changeSet);
    for (const d of sanitized.dropped) {
      io.err(`review-order: dropped edge ${d.edge.from} -> ${d.edge.to} (${d.kind})`);
    }
    changeSet = sanitized.changeSet;
  }

  const outcome = tryResolveOrder(changeSet);
  if (!outcome.ok) {
    io.err(`review-order: ${outcome.error.message}`);
    return outcome.error.isCallerError ? EXIT_CALLER_ERROR : EXIT_INTERNAL_ERROR;
  }

  io.out(args.json ? serializeResolution(outcome.resolution) : formatOrder(outcome.resolution));
  return EXIT_OK;
}
