import { randomUUID } from 'crypto';
import { ChatSessionSnapshot, ConversationTurn } from '../types/shared';
import { HISTORY_LIMIT } from '../config';
import { DocumentIndex } from './documentIndex';

export class ChatSession {
  private turns: ConversationTurn[] = [];
  private activeIndex: DocumentIndex | null = null;

  constructor(
    readonly id: string,
    private readonly historyLimit: number = HISTORY_LIMIT,
  ) {}

  get history(): ConversationTurn[] {
    return [...this.turns];
  }

  get index(): DocumentIndex | null {
    return this.activeIndex;
  }

  get documentName(): string | null {
    return this.activeIndex?.documentName ?? null;
  }

  addTurn(turn: ConversationTurn): void {
    this.turns = [...this.turns, turn].slice(-this.historyLimit);
  }

  // The new index is only installed once it is fully built
  replaceIndex(index: DocumentIndex): void {
    this.activeIndex = index;
  }

  snapshot(): ChatSessionSnapshot {
    return {
      sessionId: this.id,
      document: this.documentName,
      messages: this.history,
    };
  }
}

export class ChatSessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(
    private readonly historyLimit: number = HISTORY_LIMIT,
    private readonly generateId: () => string = randomUUID,
  ) {}

  create(): ChatSession {
    const session = new ChatSession(this.generateId(), this.historyLimit);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ChatSession | undefined {
    return this.sessions.get(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
