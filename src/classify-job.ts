import fs from 'fs';
import { classifyJob } from './classifier/index.js';
import { jobText, parseClassifyArgs } from './cli/args.js';
import { loadRegistryOrExit } from './cli/context.js';
import { formatClassification } from './cli/report.js';
import { classifierConfig, env, paths } from './config.js';
import { JobStore, rawJobToJob } from './storage/db.js';
import { selectTemplate } from './templates/templateFiles.js';

const USAGE = `Usage: classify-job <file|-> [--title "..."] [--company "..."] [--url URL]
                     [--exclude key1,key2] [--json] [--save]`;

async function main() {
  const args = parseClassifyArgs(process.argv.slice(2));
  if (!args.input) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const description = fs.readFileSync(args.input === '-' ? 0 : args.input, 'utf-8');
  const registry = loadRegistryOrExit();

  for (const key of args.excluded) {
    if (!registry.has(key)) {
      console.warn(`Ignoring unknown category in --exclude: ${key}`);
    }
  }

  const result = classifyJob(jobText(args.title, description), registry, {
    jobUrl: args.url,
    excluded: args.excluded,
    breakdownThreshold: classifierConfig.breakdownThreshold,
    lowConfidenceThreshold: classifierConfig.lowConfidenceThreshold,
  });
  const templates = selectTemplate(registry, result, paths.templatesDir);

  if (args.json) {
    console.log(JSON.stringify({ ...result, templates }, null, 2));
  } else {
    console.log('\n=== ROLE CLASSIFICATION ===\n');
    for (const line of formatClassification(result, registry)) {
      console.log(line);
    }
    console.log(`CV template: ${templates.cv ?? '(missing)'}`);
    console.log(`Cover letter template: ${templates.coverLetter ?? '(missing)'}`);
  }

  if (!args.save) return;

  if (env.DRY_RUN) {
    console.log('\n[DRY RUN] Would save this job and its classification');
    return;
  }
  if (!args.url) {
    console.error('\n--save needs --url to identify the job');
    process.exitCode = 1;
    return;
  }

  const store = new JobStore(paths.database);
  try {
    const existing = store.getJobByUrl(args.url);
    const job =
      existing ??
      rawJobToJob({
        title: args.title ?? '',
        company: args.company ?? '',
        url: args.url,
        description,
      });
    if (!existing) {
      store.appendJobs([job]);
    }
    store.saveClassification(job.id, result);
    console.log(`\nSaved classification for job ${job.id}`);
  } finally {
    store.close();
  }
}

main().catch(error => {
  console.error('\n❌ Classification failed:', error);
  process.exitCode = 1;
});
