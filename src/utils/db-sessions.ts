import { z } from 'zod';
import { CONVERSATION_KINDS } from '../core/conversation-types.js';
import type { JsonValue, Session, SessionStore } from '../core/session.js';
import type { SqliteHandle } from './db-schema.js';

/**
 * Durable session store on the same SQLite database as the marketplace
 * tables, so conversations survive a restart. Payloads are stored as JSON.
 */

interface SessionRow {
  principal_id: number;
  kind: string;
  state: string;
  payload: string;
  created_at: number;
  updated_at: number;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(jsonValueSchema),
  z.record(jsonValueSchema),
]));

const payloadSchema = z.record(jsonValueSchema);
const kindSchema = z.enum(CONVERSATION_KINDS);

export class SqliteSessionStore implements SessionStore {
  private readonly selectSession;
  private readonly upsertSession;
  private readonly deleteSession;
  private readonly deleteIdle;

  constructor(db: SqliteHandle) {
    this.selectSession = db.prepare<[number], SessionRow>(`SELECT * FROM sessions WHERE principal_id = ?`);
    this.upsertSession = db.prepare<[number, string, string, string, number, number]>(
      `INSERT INTO sessions (principal_id, kind, state, payload, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(principal_id) DO UPDATE SET
         kind = excluded.kind,
         state = excluded.state,
         payload = excluded.payload,
         created_at = excluded.created_at,
         updated_at = excluded.updated_at`,
    );
    this.deleteSession = db.prepare<[number]>(`DELETE FROM sessions WHERE principal_id = ?`);
    this.deleteIdle = db.prepare<[number]>(`DELETE FROM sessions WHERE updated_at < ?`);
  }

  async get(principalId: number): Promise<Session | undefined> {
    const row = this.selectSession.get(principalId);
    if (!row) return undefined;
    return {
      principalId: row.principal_id,
      kind: kindSchema.parse(row.kind),
      state: row.state,
      payload: payloadSchema.parse(JSON.parse(row.payload)),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async put(session: Session): Promise<void> {
    this.upsertSession.run(
      session.principalId,
      session.kind,
      session.state,
      JSON.stringify(session.payload),
      session.createdAt,
      session.updatedAt,
    );
  }

  async delete(principalId: number): Promise<void> {
    this.deleteSession.run(principalId);
  }

  async sweepExpired(cutoffMs: number): Promise<number> {
    return this.deleteIdle.run(cutoffMs).changes;
  }
}
