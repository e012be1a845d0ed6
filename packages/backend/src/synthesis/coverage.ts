import type { CoverageSummary, DocumentationLabel, RetrievalResult } from "@docent/shared";
import { emptyCoverage } from "../services/turnMetadata.js";

const LABEL_PATTERN = /\[(DOCUMENTED|CONCEPTUAL|UNCERTAIN)(?: CODE)?\]/g;
const LISTED_PATTERN = /^(?:[-*]\s+)?\[(DOCUMENTED|CONCEPTUAL|UNCERTAIN)\]:\s*(.*)$/;
const COVERAGE_HEADING = /^#{1,6}\s+Documentation Coverage\s*$/im;
const URL_PATTERN = /[a-z][a-z0-9+.-]*:\/\/[^\s<>()[\]{}"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?*_]+$/;
const DOCUMENTATION_GAP = "[DOCUMENTATION GAP]";

const labelsByTag: Record<string, DocumentationLabel> = {
  DOCUMENTED: "documented",
  CONCEPTUAL: "conceptual",
  UNCERTAIN: "uncertain"
};

export interface ResponseAnalysis {
  coverage: CoverageSummary;
  listedSources: string[];
  citedSources: string[];
}

export function analyzeResponse(response: string, retrieved: RetrievalResult): ResponseAnalysis {
  return {
    coverage: summarizeCoverage(response),
    listedSources: extractListedSources(response),
    citedSources: findCitedSources(response, retrieved)
  };
}

/**
 * Counts labelled claims in the answer body and reads the entries of its
 * "Documentation Coverage" section. Labels inside that section are not
 * counted as claims.
 */
export function summarizeCoverage(response: string): CoverageSummary {
  const coverage = emptyCoverage();

  const coverageStart = response.search(COVERAGE_HEADING);
  const body = coverageStart >= 0 ? response.slice(0, coverageStart) : response;
  for (const match of body.matchAll(LABEL_PATTERN)) {
    const label = match[1] === undefined ? undefined : labelsByTag[match[1]];
    if (label) {
      coverage.counts[label] += 1;
    }
  }

  for (const line of response.split("\n")) {
    const match = LISTED_PATTERN.exec(line.trim());
    const label = match?.[1] === undefined ? undefined : labelsByTag[match[1]];
    if (label && match) {
      coverage.listed[label] = (match[2] ?? "").trim();
    }
  }

  coverage.documentationGap = response.includes(DOCUMENTATION_GAP);
  return coverage;
}

/** Bullet entries under a "### Sources" heading, up to the next heading. */
export function extractListedSources(response: string): string[] {
  const sources: string[] = [];
  let inSources = false;

  for (const rawLine of response.split("\n")) {
    const line = rawLine.trim();
    if (/^#{1,6}\s+Sources$/.test(line)) {
      inSources = true;
    } else if (inSources && /^#{1,6}\s/.test(line)) {
      inSources = false;
    } else if (inSources && /^[-*]\s+/.test(line)) {
      sources.push(line.replace(/^[-*]\s+/, ""));
    }
  }

  return sources;
}

/** Retrieved source URLs that the response mentions, in retrieval order. */
export function findCitedSources(response: string, retrieved: RetrievalResult): string[] {
  const mentioned = new Set(extractUrls(response).map(normalizeUrl));
  const cited: string[] = [];
  for (const { chunk } of retrieved) {
    if (!cited.includes(chunk.sourceUrl) && mentioned.has(normalizeUrl(chunk.sourceUrl))) {
      cited.push(chunk.sourceUrl);
    }
  }
  return cited;
}

function extractUrls(text: string): string[] {
  return [...text.matchAll(URL_PATTERN)].map((match) => match[0].replace(TRAILING_PUNCTUATION, ""));
}

function normalizeUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
