import { fileURLToPath } from 'node:url';
import { createKnowledgeBase } from '../adapters/index.js';
import { config } from '../config/index.js';
import { formatDuration } from '../utils/helpers.js';

async function runReindex(): Promise<void> {
  console.log('Starting knowledge base update...');
  const startTime = Date.now();

  const force = process.argv.includes('--force');
  if (force) {
    console.log(
      'Force update requested. Cached fingerprints and URL schedules will be ignored.'
    );
  }

  const knowledgeBase = createKnowledgeBase(config);
  const report = await knowledgeBase.update({ kind: 'full' }, { force });

  console.log('\n--- Update Report ---');
  console.log(`Added: ${report.added.length}`);
  console.log(`Changed: ${report.changed.length}`);
  console.log(`Removed: ${report.removed.length}`);
  console.log(`Metadata only: ${report.metadataOnly.length}`);
  console.log(`Unchanged: ${report.unchanged}`);
  console.log(`URLs fetched: ${report.urlsProcessed.length}`);
  console.log(`Failures: ${report.failures.length}`);
  for (const failure of report.failures) {
    console.log(`  - ${failure.sourceId} [${failure.kind}]: ${failure.message}`);
  }
  console.log(`Index written: ${report.indexWritten ? 'yes' : 'no'}`);
  console.log('---------------------');
  console.log(
    `Update finished in ${formatDuration((Date.now() - startTime) / 1000)}.`
  );
}

const scriptPath = fileURLToPath(import.meta.url);
const isDirectRun = process.argv[1] === scriptPath;

if (isDirectRun) {
  runReindex().catch((error) => {
    console.error('Knowledge base update failed:', error);
    process.exit(1);
  });
}
