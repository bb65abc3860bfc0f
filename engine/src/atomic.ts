/**
 * DSC Engine - Atomic Step Boundary
 *
 * Every public operation runs inside `StateJournal.atomic`. Participants
 * (ledgers, in-memory tokens, mock feeds) register once and hand back a
 * restore closure whenever a step begins. If the step throws, every
 * participant is restored and queued effects are dropped.
 *
 * Nested calls (a token hook re-entering the engine) take their own
 * savepoint, so an inner failure the caller catches is undone on its own
 * while the outer step carries on.
 */

export type Restore = () => void;

export interface Checkpointable {
  /** Capture current state; the returned closure puts it back. */
  checkpoint(): Restore;
}

export class StateJournal {
  private readonly participants: Checkpointable[] = [];
  private pending: Array<() => void> = [];
  private depth = 0;

  /** Registering the same participant twice is a no-op. */
  register(participant: Checkpointable): void {
    if (!this.participants.includes(participant)) this.participants.push(participant);
  }

  /** True while a step is running. */
  get inStep(): boolean {
    return this.depth > 0;
  }

  /**
   * Queue an effect for when the outermost step commits.
   * Outside a step it runs immediately.
   */
  afterCommit(effect: () => void): void {
    if (this.depth === 0) {
      effect();
      return;
    }
    this.pending.push(effect);
  }

  atomic<T>(step: () => T): T {
    const restores = this.participants.map((p) => p.checkpoint());
    const mark = this.pending.length;

    const result = this.guard(step, restores, mark);

    if (this.depth === 0) {
      const effects = this.pending.splice(0);
      for (const effect of effects) effect();
    }
    return result;
  }

  private guard<T>(step: () => T, restores: Restore[], mark: number): T {
    this.depth += 1;
    try {
      return step();
    } catch (err) {
      this.pending.length = mark;
      for (let i = restores.length - 1; i >= 0; i--) restores[i]();
      throw err;
    } finally {
      this.depth -= 1;
    }
  }
}
