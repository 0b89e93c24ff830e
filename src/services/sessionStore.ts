export type SessionKey = number;

/** Key-value storage for per-user conversation state. */
export interface SessionStore<Value> {
  get(key: SessionKey): Promise<Value | undefined>;
  set(key: SessionKey, value: Value): Promise<void>;
  delete(key: SessionKey): Promise<void>;
}

export class InMemorySessionStore<Value> implements SessionStore<Value> {
  private readonly entries = new Map<SessionKey, Value>();

  async get(key: SessionKey): Promise<Value | undefined> {
    return this.entries.get(key);
  }

  async set(key: SessionKey, value: Value): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: SessionKey): Promise<void> {
    this.entries.delete(key);
  }
}
