import { randomUUID } from 'node:crypto';
import type { AgentThought, ChatMessage, ChatRequestPayload, ChatResponse, SessionTranscript } from '../../../shared/types.js';
import type { FarmAgent } from '../orchestrator/index.js';
import { SessionNotFoundError } from '../utils/errors.js';
import type { SessionStore } from './sessionStore.js';

export type AgentFactory = (transcript?: { messages: readonly ChatMessage[]; thoughts: readonly AgentThought[] }) => FarmAgent;

/**
 * One agent per session while it has work queued. Turns and resets on the same
 * session run one after another; different sessions proceed independently.
 * Every turn, failed ones included, is persisted, and an idle session's agent
 * is dropped and rebuilt from the store on its next turn. A session whose last
 * save failed keeps its agent in memory until a save succeeds.
 */
export class ChatService {
  private readonly agents = new Map<string, FarmAgent>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, number>();
  private readonly unsaved = new Set<string>();

  constructor(
    private readonly createAgent: AgentFactory,
    private readonly store: SessionStore
  ) {}

  async chat(payload: ChatRequestPayload): Promise<ChatResponse> {
    const sessionId = payload.sessionId ?? randomUUID();

    const response = await this.withSession(sessionId, async (agent) => {
      try {
        return await agent.runTurn(payload.message, { imagePath: payload.imagePath });
      } finally {
        this.persistAfterTurn(sessionId, agent);
      }
    });

    return { response, sessionId };
  }

  async reset(sessionId: string): Promise<SessionTranscript> {
    if (!this.pending.has(sessionId) && !this.agents.has(sessionId) && !this.store.loadTranscript(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    return this.withSession(sessionId, async (agent) => {
      agent.reset();
      return this.persist(sessionId, agent);
    });
  }

  getSession(sessionId: string): SessionTranscript | null {
    return this.store.loadTranscript(sessionId);
  }

  /** Sessions whose agent is currently held in memory. */
  get activeSessions(): number {
    return this.agents.size;
  }

  private persist(sessionId: string, agent: FarmAgent): SessionTranscript {
    try {
      const transcript = this.store.saveTranscript(sessionId, agent.getConversation(), agent.getThoughts());
      this.unsaved.delete(sessionId);
      return transcript;
    } catch (error) {
      this.unsaved.add(sessionId);
      throw error;
    }
  }

  // The turn's own answer or error stands even when saving it fails.
  private persistAfterTurn(sessionId: string, agent: FarmAgent): void {
    try {
      this.persist(sessionId, agent);
    } catch (error) {
      console.error(`Could not save session ${sessionId}; keeping it in memory.`, error);
    }
  }

  private agentFor(sessionId: string): FarmAgent {
    const existing = this.agents.get(sessionId);
    if (existing) {
      return existing;
    }

    let agent: FarmAgent | null = null;
    const stored = this.store.loadTranscript(sessionId);
    if (stored) {
      try {
        agent = this.createAgent({ messages: stored.messages, thoughts: stored.thoughts });
      } catch (error) {
        console.warn(`Could not resume session ${sessionId}; starting a new conversation.`, error);
      }
    }

    const created = agent ?? this.createAgent();
    this.agents.set(sessionId, created);
    return created;
  }

  private release(sessionId: string): void {
    const remaining = (this.pending.get(sessionId) ?? 1) - 1;
    if (remaining > 0) {
      this.pending.set(sessionId, remaining);
      return;
    }
    this.pending.delete(sessionId);
    if (!this.unsaved.has(sessionId)) {
      this.agents.delete(sessionId);
    }
  }

  private async withSession<T>(sessionId: string, task: (agent: FarmAgent) => Promise<T>): Promise<T> {
    this.pending.set(sessionId, (this.pending.get(sessionId) ?? 0) + 1);
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(async () => {
      try {
        return await task(this.agentFor(sessionId));
      } finally {
        this.release(sessionId);
      }
    });

    // `run` carries the outcome to the caller; the queue entry only marks completion.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    });

    return run;
  }
}
