/**
 * Console summary of a finished workflow run, shared by the article scripts.
 */

import type { WorkflowResult } from '../src/ai/articles';

export function printSummary(result: WorkflowResult): void {
  console.log('\n' + '='.repeat(60));
  console.log(`📄 ${result.topic}`);
  console.log('='.repeat(60));
  console.log(`   Editor grade:   ${result.editorGrade} ${result.editorReady ? '✅' : '❌'}`);
  console.log(`   Fact-check:     ${result.factCheckScore}/100 ${result.factCheckReady ? '✅' : '❌'}`);
  console.log(`   Authenticity:   ${result.authenticityScore}/100 ${result.authenticityReady ? '✅' : '❌'}`);
  console.log(`   Revisions:      ${result.totalRevisions}`);
  console.log(`   Findings:       ${result.metadata.findingsCount}`);
  console.log(`   Duration:       ${(result.metadata.totalDurationMs / 1000).toFixed(1)}s`);
  console.log(`   Output:         ${result.outputDir}`);
  if (result.requiresManualReview) {
    console.log('\n⚠️  Revision cap reached: manual review required');
  }
  console.log(result.readyToPublish ? '\n✅ Ready to publish' : '\n❌ Not ready to publish');
}
