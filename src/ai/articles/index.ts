/**
 * Editorial Workflow Module
 *
 * Research, drafting, a three-role review panel and a revision loop that runs
 * until editor, fact-checker and authenticity reviewer all approve.
 *
 * @example
 * import { runEditorialWorkflow } from './ai/articles';
 *
 * const result = await runEditorialWorkflow('Renewable Energy Storage', undefined, {
 *   onProgress: (phase, progress, message) => console.log(`[${phase}] ${progress}%: ${message}`),
 * });
 */

// Entry points
export {
  runEditorialWorkflow,
  resumeEditorialWorkflow,
  resolveGenerators,
  type EditorialGenerators,
  type EditorialWorkflowDeps,
  type EditorialWorkflowOptions,
} from './editorial-workflow';

// Types
export {
  EditorialWorkflowError,
  isEditorialWorkflowError,
  systemClock,
  type EditorialWorkflowErrorCode,
  type Finding,
  type ResearchResult,
  type ResearchRequest,
  type Issue,
  type EditorVerdict,
  type FactCheckVerdict,
  type AuthenticityVerdict,
  type ReviewVerdict,
  type ReviewRound,
  type CombinedFeedback,
  type MergedIssue,
  type RevisionRecord,
  type WorkflowResult,
  type PublicationOutput,
  type EditorialPhase,
  type EditorialProgressCallback,
  type Clock,
} from './types';

// Configuration
export { CONFIG, RESEARCH_CONFIG, REVIEW_CONFIG, WORKFLOW_CONFIG, RETRY_CONFIG } from './config';

// Agents
export { createResearchCoordinator, runResearch, runTargetedResearch, type ResearchCoordinator } from './agents/researcher';
export { createEditorReviewer } from './agents/editor';
export { createFactCheckerReviewer } from './agents/fact-checker';
export { createAuthenticityReviewer } from './agents/authenticity';
export type { Reviewer, ReviewPanel } from './agents/reviewer';
export { createDraftWriter, createRewriter } from './agents/writer';

// Building blocks
export { createTextGenerator, type TextGenerator } from './generation';
export { createSourceGateway, type SourceGateway, type SourceRecord } from './source-gateway';
export { FileResearchCache, type ResearchCache } from './research-cache';
export type { ResearchMemory } from './memory';
export { RevisionController } from './revision-controller';
export { RevisionStore } from './revision-store';
export { evaluateGate, mergeIssues, shouldTriggerResearch } from './revision-gates';
export { convertSourceCitations } from './citations';
