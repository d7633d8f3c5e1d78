import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { ConversationMessage } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { parseConversationHistory } from '../orchestrator/schemas.js';

export interface SessionSnapshot {
  sessionId: string;
  messages: ConversationMessage[];
  updatedAt: string;
}

/** Full read-before-turn / write-after-turn persistence of a session's history. */
export interface HistoryStore {
  load(sessionId: string): ConversationMessage[];
  save(sessionId: string, history: ConversationMessage[]): void;
}

function isMemoryPath(dbPath: string): boolean {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:');
}

function openDatabase(dbPath: string): Database.Database {
  // No WAL here: it makes SQLite create physical files for :memory:
  if (isMemoryPath(dbPath)) {
    return new Database(dbPath);
  }

  const absolutePath = resolve(dbPath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  const db = new Database(absolutePath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  return db;
}

interface TranscriptRow {
  session_id: string;
  messages: string;
  updated_at: string;
}

export class SessionStore implements HistoryStore {
  private db: Database.Database | null = null;
  private fallback: Map<string, SessionSnapshot> | null = null;

  constructor(dbPath: string = config.SESSION_DB_PATH) {
    try {
      this.db = openDatabase(dbPath);
      this.initialize(this.db);
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'session_store.fallback',
          reason: error instanceof Error ? error.message : String(error)
        })
      );
      this.db = null;
      this.fallback = new Map();
    }
  }

  private initialize(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS session_transcripts (
        session_id TEXT PRIMARY KEY,
        messages TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  load(sessionId: string): ConversationMessage[] {
    return this.loadTranscript(sessionId)?.messages ?? [];
  }

  save(sessionId: string, history: ConversationMessage[]): void {
    if (!sessionId.trim()) {
      return;
    }

    const updatedAt = new Date().toISOString();

    if (this.fallback) {
      this.fallback.set(sessionId, { sessionId, messages: structuredClone(history), updatedAt });
      return;
    }

    if (!this.db) {
      return;
    }

    this.db
      .prepare(
        `
          INSERT INTO session_transcripts (session_id, messages, updated_at)
          VALUES (@sessionId, @messages, @updatedAt)
          ON CONFLICT(session_id) DO UPDATE SET
            messages = excluded.messages,
            updated_at = excluded.updated_at
        `
      )
      .run({ sessionId, messages: JSON.stringify(history), updatedAt });
  }

  loadTranscript(sessionId: string): SessionSnapshot | null {
    if (!sessionId.trim()) {
      return null;
    }

    if (this.fallback) {
      const snapshot = this.fallback.get(sessionId);
      return snapshot ? { ...snapshot, messages: structuredClone(snapshot.messages) } : null;
    }

    if (!this.db) {
      return null;
    }

    const row = this.db
      .prepare<[string], TranscriptRow>(
        `SELECT session_id, messages, updated_at FROM session_transcripts WHERE session_id = ?`
      )
      .get(sessionId);

    if (!row) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(row.messages);
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'session_store.invalid_history',
          sessionId,
          reason: error instanceof Error ? error.message : String(error)
        })
      );
      return null;
    }

    const messages = parseConversationHistory(raw);
    if (!messages) {
      console.warn(JSON.stringify({ event: 'session_store.invalid_history', sessionId, reason: 'schema mismatch' }));
      return null;
    }

    return { sessionId: row.session_id, messages, updatedAt: row.updated_at };
  }

  removeSession(sessionId: string): boolean {
    if (!sessionId.trim()) {
      return false;
    }

    if (this.fallback) {
      return this.fallback.delete(sessionId);
    }

    if (!this.db) {
      return false;
    }

    const result = this.db.prepare(`DELETE FROM session_transcripts WHERE session_id = ?`).run(sessionId);
    return result.changes > 0;
  }

  clearAll(): void {
    if (this.fallback) {
      this.fallback.clear();
      return;
    }

    this.db?.exec(`DELETE FROM session_transcripts;`);
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  get usingFallback(): boolean {
    return this.fallback !== null;
  }
}

let defaultStore: SessionStore | null = null;

export function getSessionStore(): SessionStore {
  defaultStore ??= new SessionStore();
  return defaultStore;
}
