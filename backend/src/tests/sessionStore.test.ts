import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AgentThought, ChatMessage } from '../../../shared/types.js';
import { SessionStore } from '../services/sessionStore.js';

const messages: ChatMessage[] = [
  { role: 'system', content: 'sys' },
  { role: 'user', content: 'Wheat price?' },
  {
    role: 'assistant',
    content: null,
    toolCalls: [{ id: 'call_1', toolName: 'get_commodity_price', arguments: { commodity: 'Wheat' } }]
  },
  { role: 'tool', toolCallId: 'call_1', content: '{"success":true}' },
  { role: 'assistant', content: '₹2275 per quintal.' }
];

const thoughts: AgentThought[] = [
  { timestamp: '2026-01-15T08:30:00.000Z', step: 'DONE', reasoning: 'r', action: 'a', details: { toolCalls: 1 } }
];

describe('SessionStore', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(':memory:');
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  it('round-trips a transcript with tool calls', () => {
    const saved = store.saveTranscript('farmer-1', messages, thoughts);

    expect(store.persistent).toBe(true);
    expect(store.loadTranscript('farmer-1')).toEqual({
      sessionId: 'farmer-1',
      messages,
      thoughts,
      updatedAt: saved.updatedAt
    });
  });

  it('overwrites the previous transcript of a session', () => {
    store.saveTranscript('farmer-1', messages, thoughts);
    store.saveTranscript('farmer-1', messages.slice(0, 1), []);

    expect(store.loadTranscript('farmer-1')).toMatchObject({ messages: [{ role: 'system', content: 'sys' }], thoughts: [] });
  });

  it('returns null for unknown or deleted sessions', () => {
    store.saveTranscript('farmer-1', messages, thoughts);
    store.deleteTranscript('farmer-1');

    expect(store.loadTranscript('farmer-1')).toBeNull();
    expect(store.loadTranscript('never-seen')).toBeNull();
  });
});

describe('SessionStore on disk', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'sessions-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it('survives reopening the database', () => {
    const path = join(directory, 'sessions.db');
    const first = new SessionStore(path);
    first.saveTranscript('farmer-2', messages, thoughts);
    first.close();

    const second = new SessionStore(path);
    expect(second.loadTranscript('farmer-2')?.messages).toEqual(messages);
    second.close();
  });

  it('ignores a transcript it cannot parse', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const path = join(directory, 'sessions.db');
    const store = new SessionStore(path);

    const raw = new Database(path);
    raw
      .prepare('INSERT INTO session_transcripts (session_id, messages, thoughts, updated_at) VALUES (?, ?, ?, ?)')
      .run('broken', '[{"role":"robot"}]', '[]', '2026-01-15T08:30:00.000Z');
    raw.close();

    expect(store.loadTranscript('broken')).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      'SessionStore: stored transcript for broken is unreadable; ignoring it',
      expect.any(Error)
    );
    store.close();
  });
});
