export interface Turn {
  role: "user" | "assistant";
  text: string;
}

/** Rolling chat history for one session, trimmed to the newest `maxTurns`. */
export class Conversation {
  private readonly history: Turn[] = [];

  public constructor(private readonly maxTurns = 20) {}

  public append(turn: Turn): void {
    this.history.push(turn);
    const excess = this.history.length - this.maxTurns;
    if (excess > 0) this.history.splice(0, excess);
    // Generation APIs expect the history to open with a user turn.
    while (this.history.length && this.history[0].role !== "user") this.history.shift();
  }

  public turns(): readonly Turn[] {
    return this.history;
  }

  public get length(): number {
    return this.history.length;
  }
}

/**
 * Conversations keyed by chat session id. Bounded: once `maxSessions` is
 * reached the least recently used session is dropped.
 */
export class ConversationStore {
  private readonly sessions = new Map<string, Conversation>();

  public constructor(
    private readonly maxTurns = 20,
    private readonly maxSessions = 1000,
  ) {}

  /** Existing conversation, marked as most recently used. */
  public get(id: string): Conversation | undefined {
    const convo = this.sessions.get(id);
    if (convo) {
      this.sessions.delete(id);
      this.sessions.set(id, convo);
    }
    return convo;
  }

  /** Existing conversation or a fresh one. */
  public open(id: string): Conversation {
    const existing = this.get(id);
    if (existing) return existing;
    const convo = new Conversation(this.maxTurns);
    this.sessions.set(id, convo);
    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }
    return convo;
  }

  public get size(): number {
    return this.sessions.size;
  }
}
