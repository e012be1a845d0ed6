import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import type { Nodes, Root, RootContent } from "mdast";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { visit } from "unist-util-visit";
import type { ChunkDraft, MetadataMap } from "@docent/shared";
import { EmptyDocumentError, InvalidArgumentError } from "../errors.js";
import { stringList } from "../metadata/metadataValue.js";

export interface MarkdownChunkerOptions {
  maxChars: number;
  /** Minimum fill of a chunk cut back to a heading when the next block overflows. */
  headingBreakRatio: number;
  summaryMaxChars: number;
  metadataSource: string;
}

const defaultOptions: MarkdownChunkerOptions = {
  maxChars: 4000,
  headingBreakRatio: 0.3,
  summaryMaxChars: 200,
  metadataSource: "docs"
};

type BlockKind = "heading" | "code" | "prose";

interface Block {
  kind: BlockKind;
  text: string;
  plain: string;
  headingText?: string;
  codeLanguages: string[];
  /** Atomic blocks are never split, however large. */
  atomic: boolean;
}

const PHRASING_PARENTS = new Set([
  "paragraph",
  "heading",
  "emphasis",
  "strong",
  "delete",
  "link",
  "linkReference",
  "tableCell"
]);

const BLOCK_SEPARATOR = "\n\n";

export class MarkdownChunker {
  private readonly options: MarkdownChunkerOptions;
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(options: Partial<MarkdownChunkerOptions> = {}) {
    this.options = { ...defaultOptions, ...options };
    if (!Number.isInteger(this.options.maxChars) || this.options.maxChars <= 0) {
      throw new InvalidArgumentError(`maxChars must be a positive integer, received ${this.options.maxChars}`);
    }

    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.options.maxChars,
      chunkOverlap: 0,
      separators: ["\n\n", "\n", ". ", " ", ""]
    });
  }

  async chunk(rawText: string, sourceUrl: string): Promise<ChunkDraft[]> {
    const text = normalizeText(rawText);
    if (text.length === 0) {
      throw new EmptyDocumentError(sourceUrl);
    }

    const tree = parseMarkdown(text);
    const documentTitle = findDocumentTitle(tree) ?? titleFromUrl(sourceUrl);
    const blocks = await this.toBlocks(tree, text);
    if (blocks.every((block) => block.text.trim().length === 0)) {
      throw new EmptyDocumentError(sourceUrl);
    }

    const drafts: ChunkDraft[] = [];
    let lastHeading: string | undefined;
    for (const group of this.pack(blocks)) {
      const first = group[0];
      if (!first) {
        continue;
      }

      const title = first.headingText ?? lastHeading ?? documentTitle;
      for (const block of group) {
        if (block.headingText !== undefined) {
          lastHeading = block.headingText;
        }
      }

      drafts.push({
        sourceUrl,
        chunkIndex: drafts.length,
        title,
        summary: this.summarize(group, title),
        content: group.map((block) => block.text).join(BLOCK_SEPARATOR),
        metadata: this.seedMetadata(group)
      });
    }

    return drafts;
  }

  private async toBlocks(tree: Root, text: string): Promise<Block[]> {
    const blocks: Block[] = [];

    for (const node of tree.children) {
      const start = node.position?.start.offset;
      const end = node.position?.end.offset;
      if (start === undefined || end === undefined) {
        continue;
      }

      const block = describeBlock(node, text.slice(start, end));
      if (block.atomic || block.text.length <= this.options.maxChars) {
        blocks.push(block);
        continue;
      }

      for (const piece of await this.splitter.splitText(block.text)) {
        blocks.push({
          kind: "prose",
          text: piece,
          plain: plainText(parseMarkdown(piece)),
          codeLanguages: [],
          atomic: false
        });
      }
    }

    return blocks;
  }

  /**
   * Greedy packing of blocks into groups no larger than maxChars, except lone atomic blocks.
   * When the next block does not fit, the group is cut back to its last heading past
   * `headingBreakRatio` of the budget and the trailing section moves on to the next group.
   */
  private pack(blocks: Block[]): Block[][] {
    const { maxChars } = this.options;
    const groups: Block[][] = [];
    let current: Block[] = [];
    let currentLength = 0;

    const flush = (): void => {
      if (current.length > 0) {
        groups.push(current);
      }
      current = [];
      currentLength = 0;
    };
    const append = (block: Block): void => {
      currentLength += (current.length > 0 ? BLOCK_SEPARATOR.length : 0) + block.text.length;
      current.push(block);
    };
    const fits = (block: Block): boolean =>
      current.length === 0 || currentLength + BLOCK_SEPARATOR.length + block.text.length <= maxChars;

    for (const block of blocks) {
      if (fits(block)) {
        append(block);
        continue;
      }

      const carried = current.splice(this.headingBreakIndex(current));
      flush();
      for (const moved of carried) {
        append(moved);
      }
      if (!fits(block)) {
        flush();
      }
      append(block);
    }

    flush();
    return groups;
  }

  /** Index of the heading to break before, or the group length when no heading qualifies. */
  private headingBreakIndex(group: Block[]): number {
    const threshold = this.options.maxChars * this.options.headingBreakRatio;
    const prefixLengths: number[] = [];
    let length = 0;
    for (const block of group) {
      prefixLengths.push(length);
      length += (length > 0 ? BLOCK_SEPARATOR.length : 0) + block.text.length;
    }

    for (let index = group.length - 1; index > 0; index -= 1) {
      const block = group[index];
      const prefix = prefixLengths[index] ?? 0;
      // A trailing heading always moves forward with its section.
      if (block?.kind === "heading" && (prefix >= threshold || index === group.length - 1)) {
        return index;
      }
    }
    return group.length;
  }

  private summarize(group: Block[], title: string): string {
    const lead = group.find((block) => block.kind === "prose" && block.plain.length > 0);
    if (!lead) {
      return truncate(title, this.options.summaryMaxChars);
    }
    return truncate(firstSentence(lead.plain), this.options.summaryMaxChars);
  }

  private seedMetadata(group: Block[]): MetadataMap {
    const headings = group.flatMap((block) =>
      block.headingText === undefined ? [] : [block.headingText]
    );
    const languages = [...new Set(group.flatMap((block) => block.codeLanguages))];

    const metadata: MetadataMap = {
      source: { kind: "string", value: this.options.metadataSource },
      headings: stringList(headings)
    };
    if (languages.length > 0) {
      metadata.code_languages = stringList(languages);
    }
    return metadata;
  }
}

export function normalizeText(rawText: string): string {
  return rawText
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/\s+$/, ""))
    .join("\n")
    .trim();
}

function parseMarkdown(text: string): Root {
  return unified().use(remarkParse).parse(text);
}

function describeBlock(node: RootContent, text: string): Block {
  if (node.type === "heading") {
    const headingText = plainText(node);
    return { kind: "heading", text, plain: headingText, headingText, codeLanguages: [], atomic: false };
  }

  const codeLanguages: string[] = [];
  let containsCode = false;
  visit(node, "code", (code) => {
    containsCode = true;
    if (code.lang) {
      codeLanguages.push(code.lang);
    }
  });

  return {
    kind: node.type === "code" ? "code" : "prose",
    text,
    plain: node.type === "code" ? "" : plainText(node),
    codeLanguages,
    atomic: containsCode
  };
}

function plainText(node: Nodes): string {
  return collectText(node).replace(/\s+/g, " ").trim();
}

function collectText(node: Nodes): string {
  if (node.type === "text" || node.type === "inlineCode") {
    return node.value;
  }
  if (node.type === "code") {
    return "";
  }
  if (!("children" in node)) {
    return "";
  }

  const children: Nodes[] = node.children;
  return children.map(collectText).join(PHRASING_PARENTS.has(node.type) ? "" : " ");
}

function findDocumentTitle(tree: Root): string | undefined {
  let firstHeading: string | undefined;
  let topLevel: string | undefined;

  visit(tree, "heading", (heading) => {
    const text = plainText(heading);
    if (text.length === 0) {
      return;
    }
    firstHeading ??= text;
    if (heading.depth === 1) {
      topLevel ??= text;
    }
  });

  return topLevel ?? firstHeading;
}

export function titleFromUrl(sourceUrl: string): string {
  const segments = urlPath(sourceUrl)
    .split("/")
    .filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (!last) {
    return sourceUrl;
  }

  const withoutExtension = last.replace(/\.(html?|md|markdown|txt)$/i, "");
  try {
    return decodeURIComponent(withoutExtension);
  } catch {
    return withoutExtension;
  }
}

function urlPath(sourceUrl: string): string {
  try {
    const url = new URL(sourceUrl);
    return url.pathname.replace(/\/+$/, "") || url.hostname;
  } catch {
    return sourceUrl;
  }
}

export function firstSentence(text: string): string {
  const match = /^(.+?[.!?])(?=\s|$)/.exec(text);
  return match?.[1] ?? text;
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 1).trimEnd()}…`;
}
