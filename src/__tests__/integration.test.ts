/**
 * End-to-end integration tests
 * Tests the complete flow: raw JSONL -> normalize -> metadata -> chunk -> emit -> JSONL
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { processJsonl } from "../lib/pipeline/driver.js";
import type { OutputRecord } from "../types.js";

// Mock logger
vi.mock("../lib/utils/logger.js", () => ({
  logger: {
    logChunking: vi.fn(),
    logSkippedLine: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("End-to-End Integration", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "rag-prep-e2e-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  async function runPipeline(lines: string[], maxChars?: number): Promise<OutputRecord[]> {
    const inputPath = join(workDir, "raw.jsonl");
    const outputPath = join(workDir, "prepared", "chunks.jsonl");
    await writeFile(inputPath, lines.join("\n"), "utf-8");
    await processJsonl(inputPath, outputPath, { maxChars });
    return (await readFile(outputPath, "utf-8"))
      .split("\n")
      .filter(Boolean)
      .map((line): OutputRecord => JSON.parse(line));
  }

  it("should turn the overview record into one chunk", async () => {
    const records = await runPipeline([
      JSON.stringify({
        text: "Intro text.\n\n• First point\n• Second point\n\nClosing text.",
        section_path: ["Overview"],
        side_label: "box1",
      }),
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      section: "Overview",
      breadcrumb: "[box1] > Overview",
      refs: [],
      text: "Intro text.\n\n- First point\n- Second point\n\nClosing text.",
    });
    expect(records[0].text.split("\n\n")).toEqual(["Intro text.", "- First point\n- Second point", "Closing text."]);
  });

  it("should carry pages, labels and references from a messy extraction record", async () => {
    const records = await runPipeline([
      JSON.stringify({
        content: "Stimulant medi-\ncation  was reviewed (2018).\r\n\r\n\r\n● Monitor  growth\n● Check “blood pressure”",
        section: "Treatment",
        side_labels: ["R12", "R13"],
        page: 41,
        references: [2008, "2018", "NICE", 1700],
      }),
    ]);

    expect(records).toEqual([
      expect.objectContaining({
        section: "Treatment",
        breadcrumb: "[R12,R13] > Treatment",
        page_start: 41,
        page_end: 41,
        side_labels: ["R12", "R13"],
        refs: [2008, 2018],
        text: 'Stimulant medication was reviewed (2018).\n\n- Monitor growth\n- Check "blood pressure"',
      }),
    ]);
    expect(records[0].highlighted_text).toBe(records[0].text);
  });

  it("should split long records into ordered chunks without breaking bullet runs", async () => {
    const paragraph = (n: number) => `Paragraph ${n}. ${"word ".repeat(30).trim()}`;
    const text = [
      paragraph(1),
      paragraph(2),
      "• first bullet",
      "• second bullet",
      "• third bullet",
      paragraph(3),
    ].join("\n\n");

    const records = await runPipeline([JSON.stringify({ text, section_path: ["Long"] })], 200);

    const texts = records.map((r) => r.text);
    expect(texts.join("\n\n").replace(/\n+/g, " ")).toBe(
      [paragraph(1), paragraph(2), "- first bullet", "- second bullet", "- third bullet", paragraph(3)].join(" ")
    );
    const bulletChunks = texts.filter((t) => t.includes("- first bullet"));
    expect(bulletChunks).toHaveLength(1);
    expect(bulletChunks[0]).toContain("- first bullet\n- second bullet\n- third bullet");
    expect(new Set(records.map((r) => r.id)).size).toBe(records.length);
  });

  it("should keep output in input order and skip malformed lines", async () => {
    const records = await runPipeline([
      JSON.stringify({ text: "Alpha.", section: "A" }),
      "{\"text\": broken",
      "[]",
      JSON.stringify({ text: "Beta.", section: "B" }),
    ]);

    expect(records.map((r) => r.section)).toEqual(["A", "B"]);
  });
});
