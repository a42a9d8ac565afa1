import type { AgentThought } from '../../../shared/types.js';
import type { TurnState } from './types.js';

export type ThoughtSink = (thought: Readonly<AgentThought>) => void;

export interface ThoughtEntry {
  reasoning: string;
  action: string;
  details?: Record<string, unknown>;
}

/**
 * Append-only record of the agent's steps. Entries are frozen once written;
 * readers get copies of the list. Only `clear()` (on reset) removes them.
 */
export class ThoughtLog {
  private entries: Readonly<AgentThought>[] = [];

  constructor(
    private readonly sink?: ThoughtSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(step: TurnState, entry: ThoughtEntry): Readonly<AgentThought> {
    const thought: Readonly<AgentThought> = Object.freeze({
      timestamp: this.now().toISOString(),
      step,
      reasoning: entry.reasoning,
      action: entry.action,
      ...(entry.details ? { details: Object.freeze({ ...entry.details }) } : {})
    });
    this.entries.push(thought);
    this.sink?.(thought);
    return thought;
  }

  list(): Readonly<AgentThought>[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Reloads a persisted log into an empty one. */
  restore(thoughts: readonly AgentThought[]): void {
    if (this.entries.length > 0) {
      throw new Error('Cannot restore into a thought log that already has entries');
    }
    this.entries = thoughts.map((thought) =>
      Object.freeze({ ...thought, ...(thought.details ? { details: Object.freeze({ ...thought.details }) } : {}) })
    );
  }

  clear(): void {
    this.entries = [];
  }
}
