import { classifyJob } from './classifier/index.js';
import { jobText } from './cli/args.js';
import { classificationChanged } from './cli/reclassify.js';
import { loadRegistryOrExit } from './cli/context.js';
import { formatPercentage } from './cli/report.js';
import { classifierConfig, env, paths } from './config.js';
import { JobStore } from './storage/db.js';

async function main() {
  console.log('Reclassifying all stored jobs...\n');

  const registry = loadRegistryOrExit();
  const store = new JobStore(paths.database);

  try {
    const jobs = store.getAllJobs();
    console.log(`Found ${jobs.length} jobs to process\n`);

    let updated = 0;
    let unchanged = 0;

    for (const job of jobs) {
      const result = classifyJob(jobText(job.title, job.description), registry, {
        jobUrl: job.url,
        breakdownThreshold: classifierConfig.breakdownThreshold,
        lowConfidenceThreshold: classifierConfig.lowConfidenceThreshold,
      });

      if (!classificationChanged(job, result)) {
        unchanged++;
        continue;
      }

      const previous = job.templateCategory ?? '(none)';
      const share = result.bestCategory ? formatPercentage(result.percentages[result.bestCategory] ?? 0) : '-';
      console.log(`  ${job.title} @ ${job.company}: ${previous} -> ${result.templateCategory} (${share})`);

      if (!env.DRY_RUN) {
        store.saveClassification(job.id, result);
      }
      updated++;
    }

    console.log(`\nDone!${env.DRY_RUN ? ' [DRY RUN]' : ''}`);
    console.log(`  Updated: ${updated} jobs`);
    console.log(`  Unchanged: ${unchanged} jobs`);
  } finally {
    store.close();
  }
}

main().catch(error => {
  console.error('Reclassification failed:', error);
  process.exitCode = 1;
});
