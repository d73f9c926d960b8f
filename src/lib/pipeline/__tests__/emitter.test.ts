/**
 * Unit tests for the record emitter
 */

import { describe, it, expect, vi } from "vitest";
import { chunkText, chunkId, emitRecord, recordToChunks } from "../emitter.js";
import type { RecordMetadata } from "../../../types.js";

// Mock logger
vi.mock("../../utils/logger.js", () => ({
  logger: {
    logChunking: vi.fn(),
  },
}));

const metadata: RecordMetadata = {
  years: [2019],
  breadcrumb: "[box1] > Overview",
  section: "Overview",
  sideLabels: ["box1"],
  pageStart: 2,
  pageEnd: 3,
};

describe("chunkText", () => {
  it("should join paragraphs with a blank line and trim", () => {
    expect(chunkText(["  first", "- a\n- b", "last  "])).toBe("first\n\n- a\n- b\n\nlast");
  });
});

describe("chunkId", () => {
  it("should be a deterministic UUIDv5", () => {
    expect(chunkId("", 0, "hello")).toBe("bde05592-2f40-5e19-99f8-552ac8fc1f38");
    expect(chunkId("", 0, "hello")).toBe(chunkId("", 0, "hello"));
  });

  it("should only use the first 120 characters of text", () => {
    const id = "6fc7c7bd-f151-526e-84a6-7f750e111163";
    expect(chunkId("A > B", 3, "z".repeat(120))).toBe(id);
    expect(chunkId("A > B", 3, "z".repeat(120) + " trailing text")).toBe(id);
  });

  it("should encode non-ASCII names as UTF-8", () => {
    expect(chunkId("Überblick", 1, "Größe")).toBe("009b4ef4-1360-5cd5-9803-ff81b2df3e0b");
  });

  it("should hash lone surrogates as the replacement character", () => {
    expect(chunkId("", 0, "bad \ud800 text")).toBe(chunkId("", 0, "bad \ufffd text"));
    expect(chunkId("[\udc00]", 2, "x")).toBe(chunkId("[\ufffd]", 2, "x"));
  });

  it("should change when breadcrumb or index change", () => {
    const base = chunkId("A", 0, "text");
    expect(chunkId("B", 0, "text")).not.toBe(base);
    expect(chunkId("A", 1, "text")).not.toBe(base);
  });
});

describe("emitRecord", () => {
  it("should build the output record from chunk and metadata", () => {
    const record = emitRecord(["Intro.", "- a\n- b"], 1, metadata, "adhd_guideline");

    expect(record).toEqual({
      id: chunkId("[box1] > Overview", 1, "Intro.\n\n- a\n- b"),
      source: "adhd_guideline",
      section: "Overview",
      breadcrumb: "[box1] > Overview",
      page_start: 2,
      page_end: 3,
      side_labels: ["box1"],
      refs: [2019],
      text: "Intro.\n\n- a\n- b",
      highlighted_text: "Intro.\n\n- a\n- b",
    });
  });

  it("should write keys in the output order", () => {
    const record = emitRecord(["x"], 0, metadata, "src");
    expect(Object.keys(record)).toEqual([
      "id",
      "source",
      "section",
      "breadcrumb",
      "page_start",
      "page_end",
      "side_labels",
      "refs",
      "text",
      "highlighted_text",
    ]);
  });
});

describe("recordToChunks", () => {
  it("should produce one chunk for the guideline overview record", () => {
    const chunks = [
      ...recordToChunks(
        {
          text: "Intro text.\n\n• First point\n• Second point\n\nClosing text.",
          section_path: ["Overview"],
          side_label: "box1",
        },
        { maxChars: 1000, sourceName: "adhd_guideline" }
      ),
    ];

    expect(chunks).toEqual([
      {
        id: "30cff4f6-22cd-524a-9075-05e0e1735f57",
        source: "adhd_guideline",
        section: "Overview",
        breadcrumb: "[box1] > Overview",
        page_start: null,
        page_end: null,
        side_labels: ["box1"],
        refs: [],
        text: "Intro text.\n\n- First point\n- Second point\n\nClosing text.",
        highlighted_text: "Intro text.\n\n- First point\n- Second point\n\nClosing text.",
      },
    ]);
  });

  it("should emit nothing for a record without text", () => {
    expect([...recordToChunks({ section: "Empty" }, { maxChars: 1000, sourceName: "s" })]).toEqual([]);
  });

  it("should number chunks in document order and share metadata", () => {
    const text = ["First paragraph (2012).", "Second paragraph.", "Third paragraph."].join("\n\n");
    const chunks = [...recordToChunks({ content: text, refs: ["2020"] }, { maxChars: 30, sourceName: "s" })];

    expect(chunks.map((c) => c.text)).toEqual([
      "First paragraph (2012).",
      "Second paragraph.",
      "Third paragraph.",
    ]);
    expect(chunks.map((c) => c.id)).toEqual([
      chunkId("", 0, "First paragraph (2012)."),
      chunkId("", 1, "Second paragraph."),
      chunkId("", 2, "Third paragraph."),
    ]);
    for (const chunk of chunks) {
      expect(chunk.refs).toEqual([2012, 2020]);
    }
  });
});
