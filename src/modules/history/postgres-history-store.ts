import { getPostgresClient, withTransaction } from "../../clients/postgres.js";
import type { ConversationTurn, HistoryStore, TurnRole } from "./types.js";

interface ConversationTurnRow {
  role: TurnRole;
  content: string;
  created_at: Date;
}

export interface PostgresHistoryStoreDependencies {
  getPostgresClient?: typeof getPostgresClient;
  withTransaction?: typeof withTransaction;
}

const toConversationTurn = (row: ConversationTurnRow): ConversationTurn => ({
  role: row.role,
  text: row.content,
  timestamp: row.created_at
});

/**
 * Conversation turns persisted in `conversation_turns`. Rows beyond the bound
 * are deleted in the same transaction as the insert.
 */
export class PostgresHistoryStore implements HistoryStore {
  private readonly getPostgresClient: typeof getPostgresClient;
  private readonly withTransaction: typeof withTransaction;

  constructor(
    readonly maxTurns: number,
    dependencies: PostgresHistoryStoreDependencies = {}
  ) {
    if (!Number.isInteger(maxTurns) || maxTurns <= 0) {
      throw new Error(`History bound must be a positive integer, received ${maxTurns}`);
    }
    this.getPostgresClient = dependencies.getPostgresClient ?? getPostgresClient;
    this.withTransaction = dependencies.withTransaction ?? withTransaction;
  }

  async get(conversationId: string): Promise<ConversationTurn[]> {
    const { pool } = await this.getPostgresClient();
    const result = await pool.query<ConversationTurnRow>(
      `
        SELECT role, content, created_at
        FROM conversation_turns
        WHERE conversation_id = $1
        ORDER BY id DESC
        LIMIT $2
      `,
      [conversationId, this.maxTurns]
    );

    return result.rows.map(toConversationTurn).reverse();
  }

  async append(conversationId: string, turns: ConversationTurn[]): Promise<void> {
    if (turns.length === 0) {
      return;
    }

    const params: unknown[] = [conversationId];
    const values = turns.map((turn) => {
      params.push(turn.role, turn.text, turn.timestamp);
      const offset = params.length;
      return `($1, $${offset - 2}, $${offset - 1}, $${offset})`;
    });

    await this.withTransaction(async (client) => {
      await client.query(
        `INSERT INTO conversation_turns (conversation_id, role, content, created_at) VALUES ${values.join(", ")}`,
        params
      );
      await client.query(
        `
          DELETE FROM conversation_turns
          WHERE conversation_id = $1
            AND id NOT IN (
              SELECT id FROM conversation_turns
              WHERE conversation_id = $1
              ORDER BY id DESC
              LIMIT $2
            )
        `,
        [conversationId, this.maxTurns]
      );
    });
  }

  async clear(conversationId: string): Promise<void> {
    const { pool } = await this.getPostgresClient();
    await pool.query("DELETE FROM conversation_turns WHERE conversation_id = $1", [conversationId]);
  }
}
