import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { AgentThought, ChatMessage, SessionTranscript } from '../../../shared/types.js';
import { openSqliteDatabase } from '../utils/sqlite-utils.js';

const toolCallSchema = z.object({
  id: z.string(),
  toolName: z.string(),
  arguments: z.record(z.unknown())
});

const chatMessageSchema: z.ZodType<ChatMessage> = z.union([
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('user'), content: z.string() }),
  z.object({ role: z.literal('assistant'), content: z.string() }),
  z.object({ role: z.literal('assistant'), content: z.null(), toolCalls: z.array(toolCallSchema) }),
  z.object({ role: z.literal('tool'), toolCallId: z.string(), content: z.string() })
]);

const thoughtSchema: z.ZodType<AgentThought> = z.object({
  timestamp: z.string(),
  step: z.string(),
  reasoning: z.string(),
  action: z.string(),
  details: z.record(z.unknown()).optional()
});

interface TranscriptRow {
  session_id: string;
  messages: string;
  thoughts: string;
  updated_at: string;
}

/**
 * Persists each session's conversation and thought log. Falls back to an
 * in-process map when the sqlite database cannot be opened.
 */
export class SessionStore {
  private db: Database.Database | null = null;
  private fallback: Map<string, SessionTranscript> | null = null;

  constructor(dbPath: string) {
    try {
      this.db = openSqliteDatabase(dbPath);
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS session_transcripts (
          session_id TEXT PRIMARY KEY,
          messages TEXT NOT NULL,
          thoughts TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `);
    } catch (error) {
      console.warn('SessionStore: falling back to in-memory storage (better-sqlite3 unavailable)', error);
      this.db = null;
      this.fallback = new Map();
    }
  }

  get persistent(): boolean {
    return this.db !== null;
  }

  saveTranscript(sessionId: string, messages: readonly ChatMessage[], thoughts: readonly AgentThought[]): SessionTranscript {
    const transcript: SessionTranscript = {
      sessionId,
      messages: [...messages],
      thoughts: [...thoughts],
      updatedAt: new Date().toISOString()
    };

    if (!this.db) {
      this.fallback?.set(sessionId, transcript);
      return transcript;
    }

    this.db
      .prepare<{ sessionId: string; messages: string; thoughts: string; updatedAt: string }>(
        `
          INSERT INTO session_transcripts (session_id, messages, thoughts, updated_at)
          VALUES (@sessionId, @messages, @thoughts, @updatedAt)
          ON CONFLICT(session_id) DO UPDATE SET
            messages = excluded.messages,
            thoughts = excluded.thoughts,
            updated_at = excluded.updated_at
        `
      )
      .run({
        sessionId,
        messages: JSON.stringify(transcript.messages),
        thoughts: JSON.stringify(transcript.thoughts),
        updatedAt: transcript.updatedAt
      });

    return transcript;
  }

  loadTranscript(sessionId: string): SessionTranscript | null {
    if (!this.db) {
      return this.fallback?.get(sessionId) ?? null;
    }

    const row = this.db
      .prepare<[string], TranscriptRow>(
        'SELECT session_id, messages, thoughts, updated_at FROM session_transcripts WHERE session_id = ?'
      )
      .get(sessionId);
    if (!row) {
      return null;
    }

    try {
      return {
        sessionId: row.session_id,
        messages: z.array(chatMessageSchema).parse(JSON.parse(row.messages)),
        thoughts: z.array(thoughtSchema).parse(JSON.parse(row.thoughts)),
        updatedAt: row.updated_at
      };
    } catch (error) {
      console.warn(`SessionStore: stored transcript for ${sessionId} is unreadable; ignoring it`, error);
      return null;
    }
  }

  deleteTranscript(sessionId: string): void {
    if (!this.db) {
      this.fallback?.delete(sessionId);
      return;
    }
    this.db.prepare<[string]>('DELETE FROM session_transcripts WHERE session_id = ?').run(sessionId);
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}
