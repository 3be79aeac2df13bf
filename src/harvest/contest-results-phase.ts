import { CONTESTS, CONTEST_RESULTS, datasetPath } from '../datasets.js';
import { DedupStore } from '../pipeline/dedup.js';
import { runBounded } from '../pipeline/task-runner.js';
import { ContestDetailParser } from '../parsers/contest-detail.js';
import { appendRecords } from '../sink/csv-sink.js';
import { detailUrl } from '../utils/url.js';
import type { HarvestContext } from './context.js';
import type { PhaseSummary } from './summary.js';

const contestDetail = new ContestDetailParser();

/**
 * Contests → per-fighter totals.
 *
 * Candidates are every contest persisted so far (this run's and earlier
 * runs'), minus those whose results are already in `contest_results.csv`.
 * The summary counts contests, not rows: each written contest adds two rows.
 */
export async function harvestContestResults(ctx: HarvestContext): Promise<PhaseSummary> {
  const log = ctx.log.child({ phase: 'contest-results' });

  const contestStore = await DedupStore.load(
    datasetPath(ctx.outputDir, CONTESTS),
    CONTESTS.keyColumn,
  );
  const resultStore = await DedupStore.load(
    datasetPath(ctx.outputDir, CONTEST_RESULTS),
    CONTEST_RESULTS.keyColumn,
  );
  const pending = contestStore.ids().filter((id) => !resultStore.has(id));
  log.info(
    { contests: contestStore.size, pending: pending.length, alreadyPresent: contestStore.size - pending.length },
    'Contest results enumerated',
  );

  const run = await runBounded(
    pending,
    async (contestId) => {
      const $ = await ctx.http.fetchDocument(detailUrl(ctx.baseUrl, 'fight-details', contestId));
      return contestDetail.parse($, { contestId });
    },
    {
      concurrency: ctx.workerPoolSize,
      label: 'contest-detail',
      describe: (contestId) => contestId,
      log,
    },
  );

  const parsedContests = new Set(run.results.map((result) => CONTEST_RESULTS.keyOf(result)));
  const unparsed = run.succeeded - parsedContests.size;
  if (unparsed > 0) {
    log.warn({ count: unparsed }, 'Contest pages without exactly two fighters');
  }

  const rows = await appendRecords(ctx.outputDir, CONTEST_RESULTS, run.results);
  log.info({ rows, contests: parsedContests.size }, 'Contest results persisted');

  return {
    dataset: CONTEST_RESULTS.name,
    candidates: contestStore.size,
    alreadyPresent: contestStore.size - pending.length,
    written: parsedContests.size,
    failed: run.failures.length,
  };
}
