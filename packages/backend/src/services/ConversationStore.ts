import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import type {
  ConversationStore,
  ConversationTurn,
  NewConversationTurn,
  TurnCorrection
} from "@docent/shared";
import { ConversationTurnNotFoundError } from "../errors.js";
import { openDatabase } from "../store/SqliteEmbeddingIndex.js";
import { assertHistoryLimit, nextTurnTimestamp, turnMetadataSchema } from "./turnMetadata.js";

export interface SqliteConversationStoreOptions {
  dbPath?: string;
  now?: () => number;
}

interface ConversationTurnRow {
  id: string;
  conversation_id: string;
  user_id: string;
  query: string;
  response: string;
  metadata_json: string;
  created_at_ms: number;
  updated_at_ms: number;
}

interface TurnInsertParams {
  id: string;
  conversation_id: string;
  user_id: string;
  query: string;
  response: string;
  metadata_json: string;
  created_at: string;
  created_at_ms: number;
}

const turnColumns = `id, conversation_id, user_id, query, response, metadata_json, created_at_ms, updated_at_ms`;

export class SqliteConversationStore implements ConversationStore {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(options: SqliteConversationStoreOptions = {}) {
    this.db = openDatabase(options.dbPath ?? "data/docent.db");
    this.now = options.now ?? Date.now;
    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  async append(turn: NewConversationTurn): Promise<string> {
    const id = turn.turnId ?? randomUUID();
    const metadataJson = JSON.stringify(turnMetadataSchema.parse(turn.metadata));

    const lastCreatedAt = this.db.prepare<[string], { last_ms: number | null }>(
      `
      SELECT MAX(created_at_ms) AS last_ms
      FROM conversation_turns
      WHERE conversation_id = ?
      `
    );
    const insertTurn = this.db.prepare<TurnInsertParams>(
      `
      INSERT INTO conversation_turns (
        id,
        conversation_id,
        user_id,
        query,
        response,
        metadata_json,
        created_at,
        created_at_ms,
        updated_at,
        updated_at_ms
      )
      VALUES (
        @id, @conversation_id, @user_id, @query, @response, @metadata_json,
        @created_at, @created_at_ms, @created_at, @created_at_ms
      )
      `
    );

    const appendTurn = this.db.transaction(() => {
      const last = lastCreatedAt.get(turn.conversationId)?.last_ms ?? undefined;
      const createdAtMs = nextTurnTimestamp(last, this.now());
      insertTurn.run({
        id,
        conversation_id: turn.conversationId,
        user_id: turn.userId,
        query: turn.query,
        response: turn.response,
        metadata_json: metadataJson,
        created_at: new Date(createdAtMs).toISOString(),
        created_at_ms: createdAtMs
      });
    });

    appendTurn.immediate();
    return id;
  }

  async history(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    assertHistoryLimit(limit);

    const rows = this.db
      .prepare<[string, number], ConversationTurnRow>(
        `
        SELECT ${turnColumns}
        FROM conversation_turns
        WHERE conversation_id = ?
        ORDER BY created_at_ms DESC, seq DESC
        LIMIT ?
        `
      )
      .all(conversationId, limit);

    return rows.reverse().map((row) => this.mapTurnRow(row));
  }

  async getTurn(turnId: string): Promise<ConversationTurn | null> {
    const row = this.db
      .prepare<[string], ConversationTurnRow>(
        `
        SELECT ${turnColumns}
        FROM conversation_turns
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(turnId);

    return row ? this.mapTurnRow(row) : null;
  }

  async correct(turnId: string, correction: TurnCorrection): Promise<ConversationTurn> {
    const existing = await this.getTurn(turnId);
    if (!existing) {
      throw new ConversationTurnNotFoundError(turnId);
    }

    const updatedAtMs = Math.max(this.now(), existing.updatedAt.getTime());
    const metadata = correction.metadata ?? existing.metadata;

    this.db
      .prepare<{
        id: string;
        response: string;
        metadata_json: string;
        updated_at: string;
        updated_at_ms: number;
      }>(
        `
        UPDATE conversation_turns
        SET response = @response,
            metadata_json = @metadata_json,
            updated_at = @updated_at,
            updated_at_ms = @updated_at_ms
        WHERE id = @id
        `
      )
      .run({
        id: turnId,
        response: correction.response ?? existing.response,
        metadata_json: JSON.stringify(turnMetadataSchema.parse(metadata)),
        updated_at: new Date(updatedAtMs).toISOString(),
        updated_at_ms: updatedAtMs
      });

    const corrected = await this.getTurn(turnId);
    if (!corrected) {
      throw new ConversationTurnNotFoundError(turnId);
    }
    return corrected;
  }

  async listByUser(userId: string, limit = 50): Promise<ConversationTurn[]> {
    assertHistoryLimit(limit);

    return this.db
      .prepare<[string, number], ConversationTurnRow>(
        `
        SELECT ${turnColumns}
        FROM conversation_turns
        WHERE user_id = ?
        ORDER BY created_at_ms DESC, seq DESC
        LIMIT ?
        `
      )
      .all(userId, limit)
      .map((row) => this.mapTurnRow(row));
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        conversation_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        query TEXT NOT NULL,
        response TEXT NOT NULL,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL,
        created_at_ms INTEGER NOT NULL,
        updated_at TEXT NOT NULL,
        updated_at_ms INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_turns_conversation_id
        ON conversation_turns(conversation_id, created_at_ms, seq);

      CREATE INDEX IF NOT EXISTS idx_conversation_turns_user_id
        ON conversation_turns(user_id);
    `);
  }

  private mapTurnRow(row: ConversationTurnRow): ConversationTurn {
    return {
      turnId: row.id,
      conversationId: row.conversation_id,
      userId: row.user_id,
      query: row.query,
      response: row.response,
      metadata: turnMetadataSchema.parse(JSON.parse(row.metadata_json)),
      createdAt: new Date(row.created_at_ms),
      updatedAt: new Date(row.updated_at_ms)
    };
  }
}
