/**
 * Research Cache
 *
 * One JSON file per topic key under `<outputDir>/research_cache/`. A hit
 * replaces the whole research run; there is no invalidation beyond deleting
 * the file.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { toTopicKey } from '../../utils/topic-key';
import { WORKFLOW_CONFIG } from './config';
import type { ResearchResult } from './types';

// ============================================================================
// Schemas
// ============================================================================

export const FindingSchema = z.object({
  source: z.enum(['web', 'news', 'encyclopedia', 'knowledge_base', 'targeted_search']),
  title: z.string(),
  content: z.string(),
  url: z.string().optional(),
  score: z.number().optional(),
  type: z.string(),
  relatedClaim: z.string().optional(),
  priority: z.enum(['critical', 'high', 'medium']).optional(),
});

export const ResearchResultSchema = z.object({
  topic: z.string(),
  findings: z.array(FindingSchema),
  synthesis: z.object({
    confidence: z.number().min(0).max(1),
    gaps: z.array(z.string()),
  }),
  confidence: z.number().min(0).max(1),
  iterations: z.number().int().nonnegative(),
  timestamp: z.string(),
});

// ============================================================================
// Cache
// ============================================================================

export interface ResearchCache {
  /** Returns the cached result, or undefined on a miss or unreadable file */
  load(topic: string): Promise<ResearchResult | undefined>;
  /** Best-effort write; returns false (and logs) on failure */
  save(result: ResearchResult): Promise<boolean>;
}

export class FileResearchCache implements ResearchCache {
  private readonly dir: string;
  private readonly log: Logger;

  constructor(outputDir: string, logger?: Logger) {
    this.dir = path.join(outputDir, WORKFLOW_CONFIG.RESEARCH_CACHE_DIRNAME);
    this.log = logger ?? createPrefixedLogger('[ResearchCache]');
  }

  pathFor(topic: string): string {
    return path.join(this.dir, `${toTopicKey(topic)}.json`);
  }

  async load(topic: string): Promise<ResearchResult | undefined> {
    const file = this.pathFor(topic);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      this.log.warn(`Could not read research cache ${file}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn(`Research cache ${file} is not valid JSON, ignoring: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }

    const parsed = ResearchResultSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn(`Research cache ${file} has an unexpected shape, ignoring`);
      return undefined;
    }
    // Different topics can share a key; only an exact topic match counts as a hit
    if (parsed.data.topic !== topic) {
      this.log.info(`Research cache ${file} belongs to "${parsed.data.topic}", not "${topic}"; treating as a miss`);
      return undefined;
    }
    return parsed.data;
  }

  async save(result: ResearchResult): Promise<boolean> {
    const file = this.pathFor(result.topic);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(file, JSON.stringify(result, null, 2), 'utf8');
      this.log.info(`Research cached to ${file}`);
      return true;
    } catch (error) {
      this.log.error(`Failed to write research cache ${file}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
