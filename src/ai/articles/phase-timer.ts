/**
 * Phase Timer
 *
 * Tracks per-phase durations for a workflow run. Review and rewrite run once
 * per revision cycle, so a phase's duration accumulates across its runs.
 */

import type { Clock, EditorialPhase } from './types';
import { systemClock } from './types';

// ============================================================================
// Types
// ============================================================================

export type PhaseDurations = Readonly<Record<EditorialPhase, number>>;

const PHASES: readonly EditorialPhase[] = ['research', 'draft', 'review', 'rewrite', 'finalize'];

// ============================================================================
// PhaseTimer Class
// ============================================================================

/**
 * @example
 * const timer = new PhaseTimer(clock);
 *
 * timer.start('review');
 * // ... review panel ...
 * timer.end('review');
 *
 * timer.getDurations();
 * // { research: 0, draft: 0, review: 1800, rewrite: 0, finalize: 0 }
 */
export class PhaseTimer {
  private readonly clock: Clock;
  private readonly startTimes = new Map<EditorialPhase, number>();
  private readonly durations = new Map<EditorialPhase, number>();

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Starts timing a phase. Restarts the current run if already started.
   */
  start(phase: EditorialPhase): void {
    this.startTimes.set(phase, this.clock.now());
  }

  /**
   * Ends the current run of a phase and adds it to the phase total.
   *
   * @returns Duration of this run in milliseconds (0 if never started)
   */
  end(phase: EditorialPhase): number {
    const startTime = this.startTimes.get(phase);
    // startTime of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(phase, this.getDuration(phase) + duration);
    this.startTimes.delete(phase);
    return duration;
  }

  /**
   * Times an async operation as one run of `phase`, also when it throws.
   */
  async measure<T>(phase: EditorialPhase, fn: () => Promise<T>): Promise<T> {
    this.start(phase);
    try {
      return await fn();
    } finally {
      this.end(phase);
    }
  }

  getDuration(phase: EditorialPhase): number {
    return this.durations.get(phase) ?? 0;
  }

  getDurations(): PhaseDurations {
    const result: Record<EditorialPhase, number> = {
      research: 0,
      draft: 0,
      review: 0,
      rewrite: 0,
      finalize: 0,
    };
    for (const phase of PHASES) {
      result[phase] = this.getDuration(phase);
    }
    return result;
  }

  getTotalDuration(): number {
    let total = 0;
    for (const duration of this.durations.values()) {
      total += duration;
    }
    return total;
  }

  isRunning(phase: EditorialPhase): boolean {
    return this.startTimes.has(phase);
  }
}

export function createPhaseTimer(clock?: Clock): PhaseTimer {
  return new PhaseTimer(clock);
}
