/**
 * Writes an article about a topic from scratch.
 * Run with: npx tsx scripts/write-article.ts "Renewable Energy Storage"
 *
 * Options:
 *   --cap <n>        Maximum revision cycles (default: 12)
 *   --parallel       Run the three reviewers concurrently
 *   --no-cache       Ignore cached research for this topic
 */

import { config } from 'dotenv';
config();

import { isEditorialWorkflowError, runEditorialWorkflow } from '../src/ai/articles';
import { printSummary } from './print-summary';

interface CliArgs {
  readonly topic: string;
  readonly safetyCap?: number;
  readonly parallelReviews: boolean;
  readonly useCache: boolean;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const words: string[] = [];
  let safetyCap: number | undefined;
  let parallelReviews = false;
  let useCache = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--parallel') {
      parallelReviews = true;
    } else if (arg === '--no-cache') {
      useCache = false;
    } else if (arg === '--cap') {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 1) {
        throw new Error('--cap expects a positive integer');
      }
      safetyCap = value;
    } else {
      words.push(arg);
    }
  }

  return { topic: words.join(' ').trim(), safetyCap, parallelReviews, useCache };
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.topic) {
    console.error('Usage: npx tsx scripts/write-article.ts "<topic>" [--cap <n>] [--parallel] [--no-cache]');
    process.exit(1);
  }

  const result = await runEditorialWorkflow(args.topic, undefined, {
    ...(args.safetyCap !== undefined ? { safetyCap: args.safetyCap } : {}),
    parallelReviews: args.parallelReviews,
    useCache: args.useCache,
    onProgress: (phase, progress, message) => {
      console.log(`   [${phase}] ${progress}%${message ? `: ${message}` : ''}`);
    },
  });

  printSummary(result);
}

run().catch((err) => {
  if (isEditorialWorkflowError(err)) {
    console.error(`\n❌ ${err.code}: ${err.message}`);
  } else {
    console.error('\n❌ Unexpected error:', err);
  }
  process.exit(1);
});
