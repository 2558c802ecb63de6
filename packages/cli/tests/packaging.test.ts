import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const packagesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");

function readJson(...segments: string[]): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(packagesDir, ...segments), "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${segments.join("/")} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

describe.each(["core", "compiler", "cli"])("@rxmacro/%s packaging", (pkg) => {
  it("serves built JavaScript to Node and sources to the type checker", () => {
    const manifest = readJson(pkg, "package.json");
    expect(manifest.exports).toEqual({ ".": { types: "./src/index.ts", import: "./dist/index.js" } });
  });

  it("builds src/ into the dist/ the exports point at", () => {
    const build = readJson(pkg, "tsconfig.build.json");
    expect(build.compilerOptions).toMatchObject({ rootDir: "src", outDir: "dist", composite: true });
  });
});

describe("rxmacro executable", () => {
  it("points at the compiled entry of the CLI package", () => {
    expect(readJson("cli", "package.json").bin).toEqual({ rxmacro: "./dist/bin.js" });
    expect(fs.existsSync(path.join(packagesDir, "cli", "src", "bin.ts"))).toBe(true);
  });

  it("references the packages the CLI imports so they build first", () => {
    expect(readJson("cli", "tsconfig.build.json").references).toEqual([
      { path: "../core/tsconfig.build.json" },
      { path: "../compiler/tsconfig.build.json" },
    ]);
  });
});
