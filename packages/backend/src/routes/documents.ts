import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type {
  AgentResponse,
  EmbeddingIndex,
  IngestDocumentData,
  ListSourcesData,
  SourceContentData
} from "@docent/shared";
import { appConfig } from "../config.js";
import { IngestionPipeline } from "../ingestion/IngestionPipeline.js";
import { validateUploadedFile } from "../ingestion/uploadValidator.js";
import { jsonObjectSchema } from "../metadata/metadataValue.js";
import { validate } from "../middleware/validator.js";
import {
  getEmbeddingIndexSingleton,
  getIngestionPipelineSingleton
} from "../runtime/docentRuntime.js";
import { pageTitle } from "../store/indexGuards.js";

const ingestBodySchema = z.object({
  source_url: z.string().trim().min(1).max(2048),
  content: z.string().min(1),
  metadata: jsonObjectSchema.optional()
});

const uploadBodySchema = z.object({
  source_url: z.string().trim().min(1).max(2048).optional()
});

const sourceQuerySchema = z.object({
  url: z.string().trim().min(1)
});

interface CreateDocumentsRouterOptions {
  index?: EmbeddingIndex;
  pipeline?: IngestionPipeline;
  maxUploadSize?: number;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const index = options.index ?? getEmbeddingIndexSingleton();
  const pipeline = options.pipeline ?? getIngestionPipelineSingleton();
  const maxUploadSize = options.maxUploadSize ?? appConfig.MAX_UPLOAD_SIZE;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadSize
    }
  });

  const documentsRouter = Router();

  documentsRouter.post("/", validate({ body: ingestBodySchema }), async (req, res, next) => {
    try {
      const body: z.infer<typeof ingestBodySchema> = req.body;
      const result = await pipeline.ingest({
        sourceUrl: body.source_url,
        content: body.content,
        ...(body.metadata ? { metadata: body.metadata } : {})
      });

      const response: AgentResponse<IngestDocumentData> = {
        success: true,
        message: "Document ingested",
        data: { source_url: result.sourceUrl, chunk_count: result.chunkCount }
      };
      res.status(201).json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.post(
    "/upload",
    upload.single("file"),
    validate({ body: uploadBodySchema }),
    async (req, res, next) => {
      try {
        const file = req.file;
        if (!file) {
          const response: AgentResponse = { success: false, message: "No file uploaded" };
          return res.status(400).json(response);
        }

        const validated = await validateUploadedFile(file, { maxSizeBytes: maxUploadSize });
        const body: z.infer<typeof uploadBodySchema> = req.body;
        const result = await pipeline.ingest({
          sourceUrl: body.source_url ?? `upload://${validated.sanitizedFilename}`,
          content: file.buffer.toString("utf8").replace(/^\uFEFF/, "")
        });

        const response: AgentResponse<IngestDocumentData> = {
          success: true,
          message: "Document ingested",
          data: { source_url: result.sourceUrl, chunk_count: result.chunkCount }
        };
        return res.status(201).json(response);
      } catch (error) {
        return next(error);
      }
    }
  );

  documentsRouter.get("/", async (_req, res, next) => {
    try {
      const sources = await index.listSources();
      const response: AgentResponse<ListSourcesData> = {
        success: true,
        message: "Documentation sources retrieved",
        data: {
          sources: sources.map((source) => ({
            source_url: source.sourceUrl,
            title: source.title,
            chunk_count: source.chunkCount
          }))
        }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.get("/content", validate({ query: sourceQuerySchema }), async (req, res, next) => {
    try {
      const { url } = sourceQuerySchema.parse(req.query);
      const chunks = await index.getSourceChunks(url);
      const first = chunks[0];
      if (!first) {
        const response: AgentResponse = { success: false, message: `No content found for URL: ${url}` };
        return res.status(404).json(response);
      }

      const response: AgentResponse<SourceContentData> = {
        success: true,
        message: "Page content retrieved",
        data: {
          source_url: url,
          content: [`# ${pageTitle(first.title)}\n`, ...chunks.map((chunk) => chunk.content)].join("\n\n")
        }
      };
      return res.json(response);
    } catch (error) {
      return next(error);
    }
  });

  documentsRouter.delete("/", validate({ query: sourceQuerySchema }), async (req, res, next) => {
    try {
      const { url } = sourceQuerySchema.parse(req.query);
      const deleted = await index.deleteSource(url);
      if (!deleted) {
        const response: AgentResponse = { success: false, message: `No content found for URL: ${url}` };
        return res.status(404).json(response);
      }

      return res.status(204).send();
    } catch (error) {
      return next(error);
    }
  });

  return documentsRouter;
}
