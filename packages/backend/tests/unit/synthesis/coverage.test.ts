import { describe, expect, it } from "vitest";
import type { ChunkSearchResult } from "@docent/shared";
import {
  extractListedSources,
  findCitedSources,
  summarizeCoverage
} from "../../../src/synthesis/coverage.js";

const response = [
  "[DOCUMENTED] Layers are listed in the Layers view (https://docs.test/layers).",
  "[CONCEPTUAL] Most editors order layers bottom to top.",
  "[DOCUMENTED CODE]",
  "```js",
  "tiled.activeAsset.layerCount;",
  "```",
  "[UNCERTAIN] Layer limits are not stated.",
  "[DOCUMENTATION GAP] Maximum layer count.",
  "",
  "### Documentation Coverage",
  "- [DOCUMENTED]: Layers view usage",
  "[CONCEPTUAL]: Ordering convention",
  "[UNCERTAIN]: Limits",
  "",
  "### Sources",
  "- https://docs.test/layers",
  "* https://docs.test/scripting",
  "",
  "### Notes",
  "- not a source"
].join("\n");

function retrieved(sourceUrl: string, chunkIndex = 0): ChunkSearchResult {
  return {
    chunk: {
      sourceUrl,
      chunkIndex,
      title: "t",
      summary: "s",
      content: "c",
      metadata: {},
      embedding: []
    },
    score: 0.9
  };
}

describe("summarizeCoverage", () => {
  it("counts labels in the answer body only and reads the coverage section", () => {
    expect(summarizeCoverage(response)).toEqual({
      counts: { documented: 2, conceptual: 1, uncertain: 1 },
      listed: {
        documented: "Layers view usage",
        conceptual: "Ordering convention",
        uncertain: "Limits"
      },
      documentationGap: true
    });
  });

  it("returns zero counts for an unlabelled response", () => {
    expect(summarizeCoverage("Plain text.")).toEqual({
      counts: { documented: 0, conceptual: 0, uncertain: 0 },
      listed: {},
      documentationGap: false
    });
  });
});

describe("extractListedSources", () => {
  it("reads bullets up to the next heading", () => {
    expect(extractListedSources(response)).toEqual([
      "https://docs.test/layers",
      "https://docs.test/scripting"
    ]);
  });
});

describe("findCitedSources", () => {
  it("keeps retrieved URLs the response mentions, once each, in retrieval order", () => {
    expect(
      findCitedSources(response, [
        retrieved("https://docs.test/scripting"),
        retrieved("https://docs.test/export"),
        retrieved("https://docs.test/scripting", 1),
        retrieved("https://docs.test/layers")
      ])
    ).toEqual(["https://docs.test/scripting", "https://docs.test/layers"]);
  });

  it("matches whole URLs so a parent page is not cited through its child", () => {
    const answer = "[DOCUMENTED] See [parallax](https://docs.test/manual/layers/parallax) for scrolling factors.";

    expect(
      findCitedSources(answer, [
        retrieved("https://docs.test/manual/layers/"),
        retrieved("https://docs.test/manual/layers/parallax/")
      ])
    ).toEqual(["https://docs.test/manual/layers/parallax/"]);
  });

  it("ignores sentence punctuation after a URL", () => {
    expect(
      findCitedSources("Read https://docs.test/export, then https://docs.test/layers.", [
        retrieved("https://docs.test/layers"),
        retrieved("https://docs.test/export")
      ])
    ).toEqual(["https://docs.test/layers", "https://docs.test/export"]);
  });
});
