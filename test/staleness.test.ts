import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "node:path";
import { StalenessError } from "../src/core/errors.js";
import { expandPatterns } from "../src/exec/glob.js";
import { describeVerdict, evaluateStaleness } from "../src/exec/staleness.js";
import { incremental, makeTempDir, removeDir, run, setMtime, writeFiles } from "./helpers.js";

describe("staleness", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("wab-stale-");
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it("treats unconditional commands as always stale", async () => {
    const verdict = await evaluateStaleness(run("make"), tmpDir);
    expect(verdict).toEqual({ status: "stale", reason: "unconditional" });
    expect(describeVerdict(verdict)).toBe("unconditional");
  });

  it("is stale when the source is newer than the target", async () => {
    writeFiles(tmpDir, { s: "src", t: "out" });
    setMtime(path.join(tmpDir, "s"), 2000);
    setMtime(path.join(tmpDir, "t"), 1000);

    const verdict = await evaluateStaleness(incremental("make", ["s"], ["t"]), tmpDir);
    expect(verdict).toEqual({
      status: "stale",
      reason: "outdated",
      newestSource: path.join(tmpDir, "s"),
      oldestTarget: path.join(tmpDir, "t"),
    });
  });

  it("is fresh when the source is not newer than the target", async () => {
    writeFiles(tmpDir, { s: "src", t: "out" });
    setMtime(path.join(tmpDir, "s"), 1000);
    setMtime(path.join(tmpDir, "t"), 1000);

    const verdict = await evaluateStaleness(incremental("make", ["s"], ["t"]), tmpDir);
    expect(verdict.status).toBe("fresh");
  });

  it("is stale when the target is missing, whatever the source time", async () => {
    writeFiles(tmpDir, { s: "src" });
    setMtime(path.join(tmpDir, "s"), 1);

    const verdict = await evaluateStaleness(incremental("make", ["s"], ["t"]), tmpDir);
    expect(verdict).toEqual({ status: "stale", reason: "missing-target", target: "t" });
    expect(describeVerdict(verdict)).toBe("target t is missing");
  });

  it("raises when a source pattern matches nothing", async () => {
    const err = await evaluateStaleness(incremental("make", ["src/*.txt"], ["t"]), tmpDir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StalenessError);
    if (err instanceof StalenessError) {
      expect(err.code).toBe("SOURCE_NOT_FOUND");
      expect(err.message).toBe(`Source "src/*.txt" matches nothing in ${tmpDir}`);
    }
  });

  it("compares the newest source against the oldest target across globs", async () => {
    writeFiles(tmpDir, { "src/a.txt": "", "src/b.txt": "", "out/x.bin": "", "out/y.bin": "" });
    setMtime(path.join(tmpDir, "src/a.txt"), 100);
    setMtime(path.join(tmpDir, "src/b.txt"), 300);
    setMtime(path.join(tmpDir, "out/x.bin"), 400);
    setMtime(path.join(tmpDir, "out/y.bin"), 200);

    const verdict = await evaluateStaleness(incremental("make", ["src/*.txt"], ["out/*.bin"]), tmpDir);
    expect(verdict).toEqual({
      status: "stale",
      reason: "outdated",
      newestSource: path.join(tmpDir, "src/b.txt"),
      oldestTarget: path.join(tmpDir, "out/y.bin"),
    });
  });

  it("is fresh without sources once targets exist", async () => {
    writeFiles(tmpDir, { t: "" });
    const verdict = await evaluateStaleness(incremental("make", [], ["t"]), tmpDir);
    expect(verdict).toEqual({ status: "fresh", oldestTarget: path.join(tmpDir, "t") });
    expect(describeVerdict(verdict)).toBe("up to date");
  });

  it("is stale without declared targets", async () => {
    writeFiles(tmpDir, { s: "" });
    expect(await evaluateStaleness(incremental("make", ["s"], []), tmpDir)).toEqual({
      status: "stale",
      reason: "no-targets",
    });
  });
});

describe("expandPatterns", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("wab-glob-");
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it("returns sorted absolute matches per pattern", async () => {
    writeFiles(tmpDir, { "b.txt": "", "a.txt": "", ".hidden.txt": "" });
    expect(await expandPatterns(["*.txt", "missing"], tmpDir)).toEqual([
      {
        pattern: "*.txt",
        paths: [path.join(tmpDir, ".hidden.txt"), path.join(tmpDir, "a.txt"), path.join(tmpDir, "b.txt")],
      },
      { pattern: "missing", paths: [] },
    ]);
  });
});
