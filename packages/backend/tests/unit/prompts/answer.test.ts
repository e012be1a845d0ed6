import { describe, expect, it } from "vitest";
import {
  LABELLING_INSTRUCTION,
  NO_DOCUMENTATION_FOUND,
  buildAnswerPrompt,
  buildDocumentationContext,
  formatRelevance
} from "../../../src/prompts/index.js";

describe("answer prompt", () => {
  it("formats relevance as a percentage with two decimals", () => {
    expect(formatRelevance(0.87654)).toBe("87.65%");
    expect(formatRelevance(1)).toBe("100.00%");
  });

  it("renders excerpts with title, relevance and source", () => {
    expect(
      buildDocumentationContext([
        { title: "Layers", sourceUrl: "https://docs.test/layers", score: 0.5, content: "Layers stack." },
        { title: "Export", sourceUrl: "https://docs.test/export", score: 0.25, content: "Export writes." }
      ])
    ).toBe(
      [
        "### Layers (Relevance: 50.00%)\n\nLayers stack.\n\nSource: https://docs.test/layers",
        "### Export (Relevance: 25.00%)\n\nExport writes.\n\nSource: https://docs.test/export"
      ].join("\n\n---\n\n")
    );
    expect(buildDocumentationContext([])).toBe(NO_DOCUMENTATION_FOUND);
  });

  it("replays history as alternating turns before the question", () => {
    const prompt = buildAnswerPrompt({
      productName: "the Tiled map editor",
      perspective: "developer",
      grounded: true,
      chunks: [],
      history: [{ query: "What is a layer?", response: "[DOCUMENTED] A stack entry." }],
      query: "How do I add one?"
    });

    expect(prompt.messages).toEqual([
      { role: "user", content: "What is a layer?" },
      { role: "assistant", content: "[DOCUMENTED] A stack entry." },
      {
        role: "user",
        content: `Documentation excerpts:\n\n${NO_DOCUMENTATION_FOUND}\n\nQuestion: How do I add one?`
      }
    ]);
    expect(prompt.system).toContain("You assist a software developer working with the Tiled map editor.");
    expect(prompt.system.endsWith(LABELLING_INSTRUCTION)).toBe(true);
  });

  it("points the labelling instruction at the excerpts in the question message", () => {
    expect(LABELLING_INSTRUCTION).toContain(
      "[DOCUMENTED]: information taken directly from the documentation excerpts in the question message\n"
    );
    expect(LABELLING_INSTRUCTION).not.toContain("excerpts above");
  });

  it("asks for uncertain labels when answering without documentation", () => {
    const prompt = buildAnswerPrompt({
      productName: "the Tiled map editor",
      perspective: "agent",
      grounded: false,
      chunks: [],
      history: [],
      query: "q"
    });

    expect(prompt.system.endsWith("Label every claim [UNCERTAIN].")).toBe(true);
  });
});
