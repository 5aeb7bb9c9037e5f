import type { ChatTurn } from "../rag/types.js";

/** Question/answer turns of one session. Advisory context only. */
export class ChatMemory {
  private history: ChatTurn[] = [];

  constructor(private capacity = 50) {
    if (capacity <= 0) throw new Error("ChatMemory.capacity must be > 0");
  }

  save(question: string, answer: string) {
    if (this.history.length === this.capacity) this.history.shift();
    this.history.push({ question, answer });
  }

  turns(): ChatTurn[] {
    return this.history.slice();
  }

  recent(n: number): ChatTurn[] {
    return n > 0 ? this.history.slice(-n) : [];
  }

  clear() {
    this.history = [];
  }
}

/** Session id → memory, evicting the least recently used session past `maxSessions`. */
export class ChatSessions {
  private sessions = new Map<string, ChatMemory>();

  constructor(private maxSessions = 100, private turnsPerSession = 50) {}

  get(sessionId: string): ChatMemory {
    let memory = this.sessions.get(sessionId);
    if (memory) {
      this.sessions.delete(sessionId);
    } else {
      memory = new ChatMemory(this.turnsPerSession);
      if (this.sessions.size >= this.maxSessions) {
        const oldest = this.sessions.keys().next();
        if (!oldest.done) this.sessions.delete(oldest.value);
      }
    }
    this.sessions.set(sessionId, memory);
    return memory;
  }

  /** Starts the session over; false when it was unknown. */
  reset(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size() {
    return this.sessions.size;
  }
}
