export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  text: string;
  timestamp: Date;
}

/**
 * Keyed store of bounded conversation histories. Implementations keep at most
 * `maxTurns` turns per conversation and evict the oldest first.
 */
export interface HistoryStore {
  readonly maxTurns: number;
  get(conversationId: string): Promise<ConversationTurn[]>;
  append(conversationId: string, turns: ConversationTurn[]): Promise<void>;
  clear(conversationId: string): Promise<void>;
}
