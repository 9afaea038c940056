import { resolveImport } from "../src/changeset/resolveImport.js";

const FILES = new Set(["src/a.ts", "src/b/index.ts", "src/c.tsx", "src/d.js", "src/e.mts"]);

describe("resolveImport", () => {
  it("adds source extensions", () => {
    expect(resolveImport("src/b/index.ts", "../a", FILES)).toBe("src/a.ts");
  });

  it("resolves a directory to its index file", () => {
    expect(resolveImport("src/a.ts", "./b", FILES)).toBe("src/b/index.ts");
  });

  it("maps .js specifiers to TypeScript sources", () => {
    expect(resolveImport("src/a.ts", "./c.js", FILES)).toBe("src/c.tsx");
    expect(resolveImport("src/b/index.ts", "../a.js", FILES)).toBe("src/a.ts");
    expect(resolveImport("src/a.ts", "./e.mjs", FILES)).toBe("src/e.mts");
  });

  it("prefers an existing .js file", () => {
    expect(resolveImport("src/a.ts", "./d.js", FILES)).toBe("src/d.js");
  });

  it("ignores bare specifiers, missing targets and paths above the root", () => {
    expect(resolveImport("src/a.ts", "yaml", FILES)).toBeNull();
    expect(resolveImport("src/a.ts", "./missing", FILES)).toBeNull();
    expect(resolveImport("src/a.ts", "../../a", FILES)).toBeNull();
  });
});
