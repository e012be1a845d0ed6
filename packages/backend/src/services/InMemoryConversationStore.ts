import { randomUUID } from "node:crypto";
import type {
  ConversationStore,
  ConversationTurn,
  NewConversationTurn,
  TurnCorrection
} from "@docent/shared";
import { ConversationTurnNotFoundError } from "../errors.js";
import { assertHistoryLimit, nextTurnTimestamp, turnMetadataSchema } from "./turnMetadata.js";

export class InMemoryConversationStore implements ConversationStore {
  private readonly turnsByConversation = new Map<string, ConversationTurn[]>();
  private readonly turnsById = new Map<string, ConversationTurn>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  close(): void {
    this.turnsByConversation.clear();
    this.turnsById.clear();
  }

  async append(input: NewConversationTurn): Promise<string> {
    const turns = this.turnsByConversation.get(input.conversationId) ?? [];
    const last = turns[turns.length - 1];
    const createdAt = new Date(nextTurnTimestamp(last?.createdAt.getTime(), this.now()));

    const turn: ConversationTurn = {
      turnId: input.turnId ?? randomUUID(),
      conversationId: input.conversationId,
      userId: input.userId,
      query: input.query,
      response: input.response,
      metadata: turnMetadataSchema.parse(input.metadata),
      createdAt,
      updatedAt: createdAt
    };

    turns.push(turn);
    this.turnsByConversation.set(input.conversationId, turns);
    this.turnsById.set(turn.turnId, turn);
    return turn.turnId;
  }

  async history(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    assertHistoryLimit(limit);
    return (this.turnsByConversation.get(conversationId) ?? [])
      .slice(-limit)
      .map(snapshot);
  }

  async getTurn(turnId: string): Promise<ConversationTurn | null> {
    const turn = this.turnsById.get(turnId);
    return turn ? snapshot(turn) : null;
  }

  async correct(turnId: string, correction: TurnCorrection): Promise<ConversationTurn> {
    const existing = this.turnsById.get(turnId);
    if (!existing) {
      throw new ConversationTurnNotFoundError(turnId);
    }

    const corrected: ConversationTurn = {
      ...existing,
      response: correction.response ?? existing.response,
      metadata: correction.metadata ? turnMetadataSchema.parse(correction.metadata) : existing.metadata,
      updatedAt: new Date(Math.max(this.now(), existing.updatedAt.getTime()))
    };

    const turns = this.turnsByConversation.get(existing.conversationId) ?? [];
    const position = turns.findIndex((turn) => turn.turnId === turnId);
    if (position >= 0) {
      turns[position] = corrected;
    }
    this.turnsById.set(turnId, corrected);
    return snapshot(corrected);
  }

  async listByUser(userId: string, limit = 50): Promise<ConversationTurn[]> {
    assertHistoryLimit(limit);
    return [...this.turnsById.values()]
      .filter((turn) => turn.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(snapshot);
  }
}

/** Stored turns are never handed out; callers get their own copy of the metadata. */
function snapshot(turn: ConversationTurn): ConversationTurn {
  return { ...turn, metadata: turnMetadataSchema.parse(turn.metadata) };
}
