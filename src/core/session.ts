import type { ConversationKind } from './conversation-types.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Step name → validated value, in the order the steps were completed. */
export type Payload = Readonly<Record<string, JsonValue>>;

export interface Session {
  principalId: number;
  kind: ConversationKind;
  state: string;
  payload: Payload;
  /** Milliseconds since epoch. */
  createdAt: number;
  updatedAt: number;
}

/**
 * Per-principal conversation storage. Pure key-value semantics: `put`
 * overwrites whatever session the principal had, which is what keeps at
 * most one live session per principal.
 */
export interface SessionStore {
  get(principalId: number): Promise<Session | undefined>;
  put(session: Session): Promise<void>;
  delete(principalId: number): Promise<void>;
  /** Remove sessions not updated since `cutoffMs`. Returns how many were removed. */
  sweepExpired(cutoffMs: number): Promise<number>;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, Session>();

  async get(principalId: number): Promise<Session | undefined> {
    const session = this.sessions.get(principalId);
    return session ? cloneSession(session) : undefined;
  }

  async put(session: Session): Promise<void> {
    this.sessions.set(session.principalId, cloneSession(session));
  }

  async delete(principalId: number): Promise<void> {
    this.sessions.delete(principalId);
  }

  async sweepExpired(cutoffMs: number): Promise<number> {
    let removed = 0;
    for (const [principalId, session] of this.sessions) {
      if (session.updatedAt < cutoffMs) {
        this.sessions.delete(principalId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

// Stored sessions are copied on the way in and out so callers can never
// mutate a persisted payload by reference.
function cloneSession(session: Session): Session {
  return { ...session, payload: structuredClone(session.payload) };
}

// ── Payload readers ─────────────────────────────────────────────────

export function payloadString(payload: Payload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' ? value : undefined;
}

export function payloadNumber(payload: Payload, key: string): number | undefined {
  const value = payload[key];
  return typeof value === 'number' ? value : undefined;
}

export function payloadArray(payload: Payload, key: string): JsonValue[] {
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

/** Return a new payload with `key` set; the input payload is never mutated. */
export function withValue(payload: Payload, key: string, value: JsonValue): Payload {
  return { ...payload, [key]: value };
}

export function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Merge an object-valued step result into the payload; other values are ignored. */
export function mergeValue(payload: Payload, value: JsonValue): Payload {
  return isJsonObject(value) ? { ...payload, ...value } : payload;
}

/** Read a key every valid path through the conversation has set. */
export function requireString(payload: Payload, key: string): string {
  const value = payloadString(payload, key);
  if (value === undefined) throw new Error(`Session payload is missing "${key}"`);
  return value;
}

export function requireNumber(payload: Payload, key: string): number {
  const value = payloadNumber(payload, key);
  if (value === undefined) throw new Error(`Session payload is missing "${key}"`);
  return value;
}
