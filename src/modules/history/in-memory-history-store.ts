import type { ConversationTurn, HistoryStore } from "./types.js";

export class InMemoryHistoryStore implements HistoryStore {
  private readonly turnsByConversation = new Map<string, ConversationTurn[]>();

  constructor(readonly maxTurns: number) {
    if (!Number.isInteger(maxTurns) || maxTurns <= 0) {
      throw new Error(`History bound must be a positive integer, received ${maxTurns}`);
    }
  }

  async get(conversationId: string): Promise<ConversationTurn[]> {
    return [...(this.turnsByConversation.get(conversationId) ?? [])];
  }

  async append(conversationId: string, turns: ConversationTurn[]): Promise<void> {
    if (turns.length === 0) {
      return;
    }
    const current = this.turnsByConversation.get(conversationId) ?? [];
    this.turnsByConversation.set(conversationId, [...current, ...turns].slice(-this.maxTurns));
  }

  async clear(conversationId: string): Promise<void> {
    this.turnsByConversation.delete(conversationId);
  }
}
