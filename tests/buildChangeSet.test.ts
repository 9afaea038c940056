import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { buildChangeSet } from "../src/changeset/buildChangeSet.js";
import { defaultConfig } from "../src/config/reviewOrderYaml.js";
import { resolveOrder } from "../src/order/resolve.js";

const SOURCES: Record<string, string> = {
  "src/types.ts": "export interface User { id: string }\nexport type Id = string;\n",
  "src/db/userRepository.ts":
    'import type { User } from "../types.js";\nexport function findUser(id: string): User | null { return null; }\n',
  "src/services/userService.ts":
    'import { findUser } from "../db/userRepository.js";\nexport function loadUser(id: string) { return findUser(id); }\n',
  "src/index.ts": 'import { loadUser } from "./services/userService.js";\nexport const main = () => loadUser("1");\n',
  "README.md": "# sample\n",
};

const CHANGED = ["src/index.ts", "src/services/userService.ts", "src/db/userRepository.ts", "src/types.ts", "README.md"];

describe("buildChangeSet", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "review-order-build-"));
    for (const [rel, text] of Object.entries(SOURCES)) {
      const abs = join(root, rel);
      mkdirSync(dirname(abs), { recursive: true });
      writeFileSync(abs, text, "utf8");
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates one node per file with layer hints and import edges", () => {
    const built = buildChangeSet({ repoRoot: root, files: CHANGED });
    expect(built.changeSet.nodes).toEqual([
      { id: "README.md", layer: "unknown" },
      { id: "src/db/userRepository.ts", layer: "data-access" },
      { id: "src/index.ts", layer: "entry-point" },
      { id: "src/services/userService.ts", layer: "business-logic" },
      { id: "src/types.ts", layer: "data-structure" },
    ]);
    expect(built.changeSet.edges).toEqual([
      { from: "src/db/userRepository.ts", to: "src/types.ts" },
      { from: "src/index.ts", to: "src/services/userService.ts" },
      { from: "src/services/userService.ts", to: "src/db/userRepository.ts" },
    ]);
    expect(built.skipped).toEqual([]);
    expect(built.unreadable).toEqual([]);

    expect(resolveOrder(built.changeSet).order).toEqual([
      "src/types.ts",
      "src/db/userRepository.ts",
      "src/services/userService.ts",
      "src/index.ts",
      "README.md",
    ]);
  });

  it("accepts absolute paths", () => {
    const built = buildChangeSet({ repoRoot: root, files: [join(root, "src/types.ts")] });
    expect(built.changeSet.nodes).toEqual([{ id: "src/types.ts", layer: "data-structure" }]);
  });

  it("drops type-only imports when configured", () => {
    const built = buildChangeSet({
      repoRoot: root,
      files: CHANGED,
      config: { ...defaultConfig(), includeTypeImports: false },
    });
    expect(built.changeSet.edges).not.toContainEqual({ from: "src/db/userRepository.ts", to: "src/types.ts" });
    expect(built.changeSet.edges).toHaveLength(2);
  });

  it("adds symbol nodes under their file at symbol granularity", () => {
    const built = buildChangeSet({ repoRoot: root, files: CHANGED, granularity: "symbol" });
    expect(built.changeSet.nodes).toContainEqual({
      id: "src/types.ts#User",
      parent: "src/types.ts",
      layer: "data-structure",
    });
    expect(built.changeSet.nodes).toContainEqual({
      id: "src/services/userService.ts#loadUser",
      parent: "src/services/userService.ts",
      layer: "business-logic",
    });
    expect(built.changeSet.edges).toContainEqual({
      from: "src/db/userRepository.ts#findUser",
      to: "src/types.ts#User",
    });
    expect(built.changeSet.edges).toContainEqual({
      from: "src/index.ts#main",
      to: "src/services/userService.ts#loadUser",
    });

    expect(resolveOrder(built.changeSet).order).toEqual([
      "src/types.ts",
      "src/types.ts#Id",
      "src/types.ts#User",
      "src/db/userRepository.ts",
      "src/db/userRepository.ts#findUser",
      "src/services/userService.ts",
      "src/services/userService.ts#loadUser",
      "src/index.ts",
      "src/index.ts#main",
      "README.md",
    ]);
  });

  it("orders symbols within a file by their references", () => {
    writeFileSync(
      join(root, "src/pipeline.ts"),
      "export function run() { return step(); }\nfunction step() { return 1; }\n",
      "utf8",
    );
    const built = buildChangeSet({ repoRoot: root, files: ["src/pipeline.ts"], granularity: "symbol" });
    expect(resolveOrder(built.changeSet).order).toEqual([
      "src/pipeline.ts",
      "src/pipeline.ts#step",
      "src/pipeline.ts#run",
    ]);
  });

  it("reports ignored, over-limit and outside files", () => {
    const built = buildChangeSet({
      repoRoot: root,
      files: [...CHANGED, "../elsewhere.ts"],
      config: { ...defaultConfig(), ignore: ["src/db/"], maxFiles: 2 },
    });
    expect(built.changeSet.nodes.map((n) => n.id)).toEqual(["README.md", "src/index.ts"]);
    expect(built.skipped).toEqual([
      { path: "src/db/userRepository.ts", reason: "ignored" },
      { path: "../elsewhere.ts", reason: "outside_root" },
      { path: "src/services/userService.ts", reason: "over_limit" },
      { path: "src/types.ts", reason: "over_limit" },
    ]);
  });

  it("keeps a deleted file as a node without edges", () => {
    const built = buildChangeSet({ repoRoot: root, files: ["src/gone.ts", "src/types.ts"] });
    expect(built.changeSet.nodes.map((n) => n.id)).toEqual(["src/gone.ts", "src/types.ts"]);
    expect(built.unreadable).toEqual(["src/gone.ts"]);
    expect(built.changeSet.edges).toEqual([]);
  });
});
