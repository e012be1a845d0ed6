import { z } from "zod";
import type { CoverageSummary, TurnMetadata } from "@docent/shared";
import { InvalidArgumentError } from "../errors.js";

const labelCountsSchema = z.object({
  documented: z.number().int().min(0),
  conceptual: z.number().int().min(0),
  uncertain: z.number().int().min(0)
});

export const coverageSummarySchema: z.ZodType<CoverageSummary> = z.object({
  counts: labelCountsSchema,
  listed: z
    .object({
      documented: z.string(),
      conceptual: z.string(),
      uncertain: z.string()
    })
    .partial(),
  documentationGap: z.boolean()
});

export const turnMetadataSchema: z.ZodType<TurnMetadata> = z.object({
  source: z.string(),
  interactionType: z.literal("query_response"),
  perspective: z.enum(["agent", "developer"]),
  grounded: z.boolean(),
  documentationCoverage: coverageSummarySchema,
  sources: z.array(z.string()),
  listedSources: z.array(z.string()),
  retrievedChunks: z.array(
    z.object({
      sourceUrl: z.string(),
      chunkIndex: z.number().int().min(0),
      score: z.number()
    })
  )
});

export function emptyCoverage(): CoverageSummary {
  return {
    counts: { documented: 0, conceptual: 0, uncertain: 0 },
    listed: {},
    documentationGap: false
  };
}

export function assertHistoryLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError(`History limit must be a positive integer, received ${limit}`);
  }
}

/** Next createdAt for a conversation: never earlier than the clock, always after the last turn. */
export function nextTurnTimestamp(lastMs: number | undefined, nowMs: number): number {
  return lastMs === undefined ? nowMs : Math.max(nowMs, lastMs + 1);
}
