import type { Perspective } from "@docent/shared";
import type { CompletionPrompt, PromptMessage } from "../services/llmTypes.js";

export interface PromptChunk {
  title: string;
  sourceUrl: string;
  score: number;
  content: string;
}

export interface PromptTurn {
  query: string;
  response: string;
}

export interface AnswerPromptInput {
  productName: string;
  perspective: Perspective;
  grounded: boolean;
  chunks: PromptChunk[];
  history: PromptTurn[];
  query: string;
}

export const NO_DOCUMENTATION_FOUND = "No relevant documentation was found for this question.";

const audienceParagraphs: Record<Perspective, (productName: string) => string> = {
  agent: (productName) =>
    `You assist other AI agents that are implementing ${productName} features. Answer with implementation-ready detail they can use directly: exact property names, data types, file formats and configuration parameters.`,
  developer: (productName) =>
    `You assist a software developer working with ${productName}. Explain the relevant concepts before the implementation steps, and call out common pitfalls.`
};

export const LABELLING_INSTRUCTION = `
Label every factual claim with exactly one of:
[DOCUMENTED]: information taken directly from the documentation excerpts in the question message
[CONCEPTUAL]: suggested approaches or examples that are not in the documentation
[UNCERTAIN]: information that cannot be verified in the documentation

Start every code block with [DOCUMENTED CODE] or [CONCEPTUAL CODE].
When the documentation does not cover the question, begin the answer with "[DOCUMENTATION GAP] This information is not available in the official documentation."
Cite the full source URL in parentheses after each documented claim.

End the answer with these sections:
### Documentation Coverage
- [DOCUMENTED]: features covered by the documentation
- [CONCEPTUAL]: suggested implementations
- [UNCERTAIN]: areas lacking documentation

### Sources
- one line per source URL you used
`.trim();

const UNGROUNDED_INSTRUCTION =
  "The documentation search is unavailable for this question. Label every claim [UNCERTAIN].";

export function buildAnswerSystemPrompt(input: Pick<AnswerPromptInput, "productName" | "perspective" | "grounded">): string {
  const sections = [
    `You are an expert on ${input.productName}. Answer using the retrieved documentation excerpts and the earlier turns of this conversation.`,
    audienceParagraphs[input.perspective](input.productName),
    "Build on earlier answers in the conversation instead of repeating them, and correct them when the documentation disagrees.",
    LABELLING_INSTRUCTION
  ];
  if (!input.grounded) {
    sections.push(UNGROUNDED_INSTRUCTION);
  }
  return sections.join("\n\n");
}

export function formatRelevance(score: number): string {
  return `${(score * 100).toFixed(2)}%`;
}

export function buildDocumentationContext(chunks: PromptChunk[]): string {
  if (chunks.length === 0) {
    return NO_DOCUMENTATION_FOUND;
  }

  return chunks
    .map((chunk) =>
      [
        `### ${chunk.title} (Relevance: ${formatRelevance(chunk.score)})`,
        chunk.content,
        `Source: ${chunk.sourceUrl}`
      ].join("\n\n")
    )
    .join("\n\n---\n\n");
}

export function buildAnswerPrompt(input: AnswerPromptInput): CompletionPrompt {
  const messages: PromptMessage[] = [];
  for (const turn of input.history) {
    messages.push({ role: "user", content: turn.query });
    messages.push({ role: "assistant", content: turn.response });
  }

  messages.push({
    role: "user",
    content: `Documentation excerpts:\n\n${buildDocumentationContext(input.chunks)}\n\nQuestion: ${input.query}`
  });

  return {
    system: buildAnswerSystemPrompt(input),
    messages
  };
}
