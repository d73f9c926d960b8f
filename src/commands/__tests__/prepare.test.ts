/**
 * Tests for the prepare command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resetConfig } from "../../config.js";
import { parseCliArgs, run } from "../prepare.js";

describe("parseCliArgs", () => {
  it("should read long and short options", () => {
    expect(parseCliArgs(["-i", "raw.jsonl", "--output", "out.jsonl", "--max-chars", "800"])).toEqual({
      input: "raw.jsonl",
      output: "out.jsonl",
      maxChars: 800,
      source: undefined,
      logLevel: undefined,
    });
  });

  it("should require input and output", () => {
    expect(() => parseCliArgs(["--output", "out.jsonl"])).toThrow("Invalid input: --input is required");
  });

  it("should reject a non-numeric chunk size", () => {
    expect(() => parseCliArgs(["-i", "a", "-o", "b", "--max-chars", "many"])).toThrow(/^Invalid maxChars:/);
  });

  it("should reject unknown options", () => {
    expect(() => parseCliArgs(["-i", "a", "-o", "b", "--verbose"])).toThrow();
  });
});

describe("run", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "rag-prep-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
    resetConfig();
    vi.restoreAllMocks();
  });

  it("should write chunks and print the summary line", async () => {
    const inputPath = join(workDir, "raw.jsonl");
    const outputPath = join(workDir, "out", "chunks.jsonl");
    await writeFile(inputPath, `${JSON.stringify({ text: "First.\n\nSecond." })}\n`, "utf-8");

    const code = await run(["-i", inputPath, "-o", outputPath, "--max-chars", "8", "--source", "cli_corpus"]);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith(`Done. read_items=1, wrote_chunks=2, out=${outputPath}`);
    const lines = (await readFile(outputPath, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('"source":"cli_corpus"');
  });

  it("should exit with 1 when the input cannot be read", async () => {
    const code = await run(["-i", join(workDir, "missing.jsonl"), "-o", join(workDir, "out.jsonl")]);

    expect(code).toBe(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("should exit with 1 for invalid arguments without running the pipeline", async () => {
    expect(await run(["-i", "a.jsonl"])).toBe(1);
    expect(await run(["-i", "a.jsonl", "-o", "b.jsonl", "--log-level", "loud"])).toBe(1);
    expect(console.log).not.toHaveBeenCalled();
  });
});
