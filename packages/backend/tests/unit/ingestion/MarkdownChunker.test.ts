import { describe, expect, it } from "vitest";
import { EmptyDocumentError, InvalidArgumentError } from "../../../src/errors.js";
import {
  MarkdownChunker,
  firstSentence,
  normalizeText,
  titleFromUrl,
  truncate
} from "../../../src/ingestion/MarkdownChunker.js";
import { toJsonObject } from "../../../src/metadata/metadataValue.js";

const pageUrl = "https://docs.example.com/manual/layers.html";

describe("MarkdownChunker", () => {
  it("keeps a small page in one chunk with its headings and lead sentence", async () => {
    const text = [
      "# Layers",
      "Tile layers hold tiles. They are the most common layer.",
      "## Object Layers",
      "Object layers hold shapes."
    ].join("\n\n");

    const chunks = await new MarkdownChunker().chunk(text, pageUrl);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      sourceUrl: pageUrl,
      chunkIndex: 0,
      title: "Layers",
      summary: "Tile layers hold tiles.",
      content: text
    });
    expect(toJsonObject(chunks[0]?.metadata ?? {})).toEqual({
      source: "docs",
      headings: ["Layers", "Object Layers"]
    });
  });

  it("keeps sections together while the page fits the budget", async () => {
    const text = [
      "# Intro",
      "This paragraph is long enough to pass thirty characters.",
      "## Next",
      "Short text."
    ].join("\n\n");

    const chunks = await new MarkdownChunker({ maxChars: 100 }).chunk(text, pageUrl);

    expect(chunks.map((chunk) => chunk.content)).toEqual([text]);
    expect(chunks[0]?.title).toBe("Intro");
  });

  it("breaks at the last heading past the break ratio when the budget overflows", async () => {
    const text = [
      "# Intro",
      "This paragraph is long enough to pass thirty characters.",
      "## Next",
      "Short text.",
      "Another paragraph closes the section."
    ].join("\n\n");

    const chunks = await new MarkdownChunker({ maxChars: 100 }).chunk(text, pageUrl);

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      "# Intro\n\nThis paragraph is long enough to pass thirty characters.",
      "## Next\n\nShort text.\n\nAnother paragraph closes the section."
    ]);
    expect(chunks.map((chunk) => chunk.title)).toEqual(["Intro", "Next"]);
    expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1]);
    expect(chunks[1]?.summary).toBe("Short text.");
  });

  it("keeps a multi-section page under the default budget in one chunk", async () => {
    const section = (name: string): string[] => [`## ${name}`, `${name} details. `.repeat(40).trim()];
    const text = ["# Layers", ...section("Tile Layers"), ...section("Object Layers")].join("\n\n");

    const chunks = await new MarkdownChunker().chunk(text, pageUrl);

    expect(text.length).toBeGreaterThan(1200);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.content).toBe(text);
  });

  it("never splits a code block, even past maxChars", async () => {
    const code = "```ts\nconst value = computeSomethingVeryLong(1, 2, 3);\n```";
    const chunks = await new MarkdownChunker({ maxChars: 40 }).chunk(`Intro text.\n\n${code}`, pageUrl);

    expect(chunks.map((chunk) => chunk.content)).toEqual(["Intro text.", code]);
    expect(chunks[1]?.title).toBe("layers");
    expect(chunks[1]?.summary).toBe("layers");
    expect(toJsonObject(chunks[1]?.metadata ?? {})).toEqual({
      source: "docs",
      headings: [],
      code_languages: ["ts"]
    });
  });

  it("splits an oversized paragraph on word boundaries", async () => {
    const words = Array.from({ length: 40 }, (_, index) => `word${index}`);
    const chunks = await new MarkdownChunker({ maxChars: 50 }).chunk(words.join(" "), pageUrl);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(50);
    }
    expect(chunks.map((chunk) => chunk.content).join(" ").split(/\s+/)).toEqual(words);
    expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual(chunks.map((_, index) => index));
  });

  it("titles a headingless section after the last heading seen", async () => {
    const text = [
      "# Guide",
      "First paragraph fills the chunk quickly.",
      "Second paragraph continues the same section."
    ].join("\n\n");

    const chunks = await new MarkdownChunker({ maxChars: 60 }).chunk(text, pageUrl);

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      "# Guide\n\nFirst paragraph fills the chunk quickly.",
      "Second paragraph continues the same section."
    ]);
    expect(chunks[1]?.title).toBe("Guide");
  });

  it("rejects whitespace-only documents", async () => {
    await expect(new MarkdownChunker().chunk("  \n\r\n\t ", pageUrl)).rejects.toBeInstanceOf(
      EmptyDocumentError
    );
  });

  it("rejects a non-positive maxChars", () => {
    expect(() => new MarkdownChunker({ maxChars: 0 })).toThrow(InvalidArgumentError);
  });
});

describe("chunker text helpers", () => {
  it("normalizes line endings and trailing whitespace", () => {
    expect(normalizeText("# T\r\n\r\nLine one.  \r\n")).toBe("# T\n\nLine one.");
  });

  it("derives a title from the last path segment", () => {
    expect(titleFromUrl("https://docs.example.com/guide/Getting%20Started.md")).toBe("Getting Started");
    expect(titleFromUrl("upload://notes.txt")).toBe("notes");
  });

  it("reads the first sentence without stopping inside version numbers", () => {
    expect(firstSentence("Version 1.5 adds layers. More follows.")).toBe("Version 1.5 adds layers.");
    expect(firstSentence("No terminal punctuation")).toBe("No terminal punctuation");
  });

  it("truncates with an ellipsis", () => {
    expect(truncate("abcdef", 4)).toBe("abc…");
    expect(truncate("abc", 4)).toBe("abc");
  });
});
