/**
 * Progress Tracker
 *
 * Reports workflow progress through the optional callback with consistent
 * percentages across phases.
 */

import type { EditorialPhase, EditorialProgressCallback } from './types';

// ============================================================================
// ProgressTracker Class
// ============================================================================

/**
 * @example
 * const tracker = new ProgressTracker(onProgress);
 *
 * tracker.startPhase('research');
 * tracker.completePhase('research', 'Collected 42 findings');
 *
 * tracker.reportCycle('review', 2, 12, 'Reviewing version 2');
 */
export class ProgressTracker {
  constructor(private readonly onProgress?: EditorialProgressCallback) {}

  /**
   * Reports the start of a phase (0% progress).
   */
  startPhase(phase: EditorialPhase, message?: string): void {
    this.onProgress?.(phase, 0, message ?? this.getDefaultStartMessage(phase));
  }

  /**
   * Reports the completion of a phase (100% progress).
   */
  completePhase(phase: EditorialPhase, message: string): void {
    this.onProgress?.(phase, 100, message);
  }

  /**
   * Reports a revision cycle as a share of the cycle cap. Convergence
   * usually happens well before the cap, so this is an upper bound.
   *
   * @param cycle - Current cycle (1-indexed)
   * @param cap - Maximum cycles for this run
   */
  reportCycle(phase: EditorialPhase, cycle: number, cap: number, message?: string): void {
    const progress = cap > 0 ? Math.min(100, Math.round((cycle / cap) * 100)) : 0;
    this.onProgress?.(phase, progress, message);
  }

  /**
   * Reports arbitrary progress within a phase.
   */
  report(phase: EditorialPhase, progress: number, message?: string): void {
    this.onProgress?.(phase, progress, message);
  }

  get hasCallback(): boolean {
    return this.onProgress !== undefined;
  }

  private getDefaultStartMessage(phase: EditorialPhase): string {
    switch (phase) {
      case 'research':
        return 'Researching topic';
      case 'draft':
        return 'Writing first draft';
      case 'review':
        return 'Reviewing article';
      case 'rewrite':
        return 'Revising article';
      case 'finalize':
        return 'Finalizing article';
      default:
        return `Starting ${phase} phase`;
    }
  }
}

/**
 * Creates a tracker with no callback. All methods are safe to call.
 */
export function createNoOpProgressTracker(): ProgressTracker {
  return new ProgressTracker(undefined);
}
