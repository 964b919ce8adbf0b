import type { Turn } from "./types";

/**
 * Ordered (query, response) turns of one session. Append-only until {@link reset}; owned by
 * whoever drives the orchestrator, never shared across sessions.
 */
export class ConversationContext {
  private turns: Turn[] = [];

  public append(turn: Turn): void {
    this.turns.push({ query: turn.query, response: turn.response });
  }

  /** The last `n` turns, oldest first. */
  public recent(n: number): Turn[] {
    if (n <= 0) return [];
    return this.turns.slice(-n);
  }

  public all(): readonly Turn[] {
    return this.turns;
  }

  public reset(): void {
    this.turns = [];
  }

  public get size(): number {
    return this.turns.length;
  }
}
