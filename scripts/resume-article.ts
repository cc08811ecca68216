/**
 * Resumes a saved run from one of its article versions.
 * Run with: npx tsx scripts/resume-article.ts output/<run>/article_v3.md ["feedback for the rewrite"]
 */

import { config } from 'dotenv';
config();

import { isEditorialWorkflowError, resumeEditorialWorkflow } from '../src/ai/articles';
import { printSummary } from './print-summary';

async function run(): Promise<void> {
  const [articlePath, ...feedbackWords] = process.argv.slice(2);
  if (!articlePath) {
    console.error('Usage: npx tsx scripts/resume-article.ts <path/to/article_vN.md> ["feedback"]');
    process.exit(1);
  }

  const feedback = feedbackWords.join(' ').trim();
  console.log(`🔁 Resuming ${articlePath}${feedback ? ' with feedback' : ''}`);

  const result = await resumeEditorialWorkflow(articlePath, feedback || undefined, undefined, {
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
