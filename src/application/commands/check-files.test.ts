import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DocumentReadError } from "../../domain/errors.ts";
import { checkFile, checkFiles, hasFailures } from "./check-files.ts";

describe("checkFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "latex-labels-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("checks each file independently", async () => {
    const clean = join(dir, "clean.tex");
    const other = join(dir, "other.tex");
    const broken = join(dir, "broken.tex");
    const missing = join(dir, "missing.tex");
    await writeFile(clean, "\\section{Intro}\n\\label{sec:intro}\n");
    await writeFile(other, "No sections here.\n");
    await writeFile(broken, "\\section{Intro}\n");

    const results = await checkFiles([clean, broken, missing, other]);

    expect(results.map((r) => r.path)).toEqual([clean, broken, missing, other]);
    expect(results[0]).toEqual({ success: true, path: clean, hasMismatch: false, findings: [] });
    expect(results[1]).toEqual({
      success: true,
      path: broken,
      hasMismatch: true,
      findings: [{ line: 1, type: "missing-label", expected: "sec:intro", observed: null }],
    });
    expect(results[3]).toEqual({ success: true, path: other, hasMismatch: false, findings: [] });

    const failed = results[2];
    expect(failed?.success).toBe(false);
    if (failed && !failed.success) {
      expect(failed.error).toBeInstanceOf(DocumentReadError);
      expect(failed.error.message).toBe(`Could not read file '${missing}'`);
      expect(failed.error.cause).toBeInstanceOf(Error);
    }

    expect(hasFailures(results)).toBe(true);
  });

  it("passes when no file has a problem", async () => {
    const clean = join(dir, "clean.tex");
    await writeFile(clean, "\\subsection{Setup} % skip-label\n\\label{ssec:install}\n");

    const results = await checkFiles([clean]);
    expect(hasFailures(results)).toBe(false);
  });

  it("passes for an empty batch", async () => {
    expect(hasFailures(await checkFiles([]))).toBe(false);
  });
});

describe("checkFile", () => {
  it("reads through the given reader", async () => {
    const result = await checkFile("virtual.tex", {
      readText: async () => "\\section{A}\n\\label{sec:b}\n",
    });

    expect(result).toEqual({
      success: true,
      path: "virtual.tex",
      hasMismatch: true,
      findings: [{ line: 1, type: "wrong-label", expected: "sec:a", observed: "sec:b" }],
    });
  });

  it("wraps reader failures", async () => {
    const result = await checkFile("virtual.tex", {
      readText: async () => {
        throw new Error("permission denied");
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Could not read file 'virtual.tex'");
      expect(result.error.cause).toEqual(new Error("permission denied"));
    }
  });
});
