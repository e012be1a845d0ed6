import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type {
  DocumentChunk,
  EmbeddingIndex,
  IndexStats,
  MetadataMap,
  RetrievalResult,
  SourceSummary
} from "@docent/shared";
import { DimensionMismatchError } from "../errors.js";
import { mapContains, parseMetadataJson, stringifyMetadata } from "../metadata/metadataValue.js";
import { cosineSimilarity, rankTopK } from "../retrieval/similarity.js";
import { assertDimension, assertTopK, groupChunksBySource, summarizeSource } from "./indexGuards.js";

export interface SqliteEmbeddingIndexOptions {
  dbPath?: string;
  dimension: number;
}

interface ChunkRow {
  source_url: string;
  chunk_index: number;
  title: string;
  summary: string;
  content: string;
  metadata_json: string;
  embedding_json: string;
}

interface ChunkInsertParams {
  source_url: string;
  chunk_index: number;
  title: string;
  summary: string;
  content: string;
  metadata_json: string;
  embedding_json: string;
  created_at: string;
}

const embeddingSchema = z.array(z.number());

const chunkColumns = `source_url, chunk_index, title, summary, content, metadata_json, embedding_json`;

export class SqliteEmbeddingIndex implements EmbeddingIndex {
  readonly dimension: number;
  private readonly db: Database.Database;

  constructor(options: SqliteEmbeddingIndexOptions) {
    this.dimension = options.dimension;
    this.db = openDatabase(options.dbPath ?? "data/docent.db");
    this.initializeSchema();
    this.ensureDimension();
  }

  close(): void {
    this.db.close();
  }

  async upsert(chunks: DocumentChunk[]): Promise<void> {
    const groups = groupChunksBySource(this.dimension, chunks);
    if (groups.size === 0) {
      return;
    }

    const deleteSource = this.db.prepare<[string]>(
      `DELETE FROM doc_chunks WHERE source_url = ?`
    );
    const insertChunk = this.db.prepare<ChunkInsertParams>(
      `
      INSERT INTO doc_chunks (${chunkColumns}, created_at)
      VALUES (@source_url, @chunk_index, @title, @summary, @content, @metadata_json, @embedding_json, @created_at)
      `
    );

    const replaceAll = this.db.transaction((batch: Map<string, DocumentChunk[]>) => {
      const now = new Date().toISOString();
      for (const [sourceUrl, group] of batch) {
        deleteSource.run(sourceUrl);
        for (const chunk of group) {
          insertChunk.run({
            source_url: chunk.sourceUrl,
            chunk_index: chunk.chunkIndex,
            title: chunk.title,
            summary: chunk.summary,
            content: chunk.content,
            metadata_json: stringifyMetadata(chunk.metadata),
            embedding_json: JSON.stringify(chunk.embedding),
            created_at: now
          });
        }
      }
    });

    replaceAll.immediate(groups);
  }

  async search(queryVector: number[], k: number, filter: MetadataMap = {}): Promise<RetrievalResult> {
    assertDimension(this.dimension, queryVector);
    assertTopK(k);

    const rows = this.db
      .prepare<[], ChunkRow>(`SELECT ${chunkColumns} FROM doc_chunks`)
      .iterate();

    const candidates: RetrievalResult = [];
    for (const row of rows) {
      const chunk = this.mapChunkRow(row);
      if (!mapContains(chunk.metadata, filter)) {
        continue;
      }
      candidates.push({
        chunk,
        score: cosineSimilarity(queryVector, chunk.embedding)
      });
    }

    return rankTopK(candidates, k);
  }

  async listSources(): Promise<SourceSummary[]> {
    const rows = this.db
      .prepare<[], ChunkRow>(
        `
        SELECT ${chunkColumns}
        FROM doc_chunks
        WHERE chunk_index = (
          SELECT MIN(inner_chunks.chunk_index)
          FROM doc_chunks AS inner_chunks
          WHERE inner_chunks.source_url = doc_chunks.source_url
        )
        ORDER BY source_url ASC
        `
      )
      .all();
    const counts = new Map(
      this.db
        .prepare<[], { source_url: string; chunk_count: number }>(
          `SELECT source_url, COUNT(*) AS chunk_count FROM doc_chunks GROUP BY source_url`
        )
        .all()
        .map((row) => [row.source_url, row.chunk_count])
    );

    return rows.map((row) => ({
      ...summarizeSource(row.source_url, [this.mapChunkRow(row)]),
      chunkCount: counts.get(row.source_url) ?? 0
    }));
  }

  async getSourceChunks(sourceUrl: string): Promise<DocumentChunk[]> {
    return this.db
      .prepare<[string], ChunkRow>(
        `
        SELECT ${chunkColumns}
        FROM doc_chunks
        WHERE source_url = ?
        ORDER BY chunk_index ASC
        `
      )
      .all(sourceUrl)
      .map((row) => this.mapChunkRow(row));
  }

  async deleteSource(sourceUrl: string): Promise<boolean> {
    const result = this.db
      .prepare<[string]>(`DELETE FROM doc_chunks WHERE source_url = ?`)
      .run(sourceUrl);
    return result.changes > 0;
  }

  async stats(): Promise<IndexStats> {
    const row = this.db
      .prepare<[], { chunk_count: number; source_count: number }>(
        `SELECT COUNT(*) AS chunk_count, COUNT(DISTINCT source_url) AS source_count FROM doc_chunks`
      )
      .get();

    return {
      dimension: this.dimension,
      chunkCount: row?.chunk_count ?? 0,
      sourceCount: row?.source_count ?? 0
    };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS doc_chunks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_url TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        title TEXT NOT NULL,
        summary TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        embedding_json TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (source_url, chunk_index)
      );

      CREATE INDEX IF NOT EXISTS idx_doc_chunks_source_url
        ON doc_chunks(source_url, chunk_index);

      CREATE TABLE IF NOT EXISTS index_settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  private ensureDimension(): void {
    const stored = this.db
      .prepare<[], { value: string }>(`SELECT value FROM index_settings WHERE key = 'dimension'`)
      .get();

    if (!stored) {
      this.db
        .prepare<[string]>(`INSERT INTO index_settings (key, value) VALUES ('dimension', ?)`)
        .run(String(this.dimension));
      return;
    }

    const storedDimension = Number(stored.value);
    if (storedDimension !== this.dimension) {
      throw new DimensionMismatchError(storedDimension, this.dimension);
    }
  }

  private mapChunkRow(row: ChunkRow): DocumentChunk {
    return {
      sourceUrl: row.source_url,
      chunkIndex: row.chunk_index,
      title: row.title,
      summary: row.summary,
      content: row.content,
      metadata: parseMetadataJson(row.metadata_json),
      embedding: embeddingSchema.parse(JSON.parse(row.embedding_json))
    };
  }
}

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath === ":memory:") {
    const memoryDb = new Database(":memory:");
    memoryDb.pragma("foreign_keys = ON");
    return memoryDb;
  }

  const resolved = resolve(dbPath);
  mkdirSync(dirname(resolved), { recursive: true });

  const db = new Database(resolved);
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  return db;
}
