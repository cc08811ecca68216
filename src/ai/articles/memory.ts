/**
 * Research Memory
 *
 * Optional long-term store the workflow reports to: completed research and the
 * feedback each revision received. Nothing reads it back during a run.
 */

import type { CombinedFeedback, ResearchResult } from './types';

export interface ResearchMemory {
  rememberResearch(result: ResearchResult): Promise<void>;
  rememberFeedback(topic: string, revision: number, feedback: CombinedFeedback): Promise<void>;
}
