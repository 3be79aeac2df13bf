import { ENTITIES, datasetPath } from '../datasets.js';
import { DedupStore } from '../pipeline/dedup.js';
import { runBounded } from '../pipeline/task-runner.js';
import { EntityDetailParser } from '../parsers/entity-detail.js';
import { EntityListParser } from '../parsers/entity-list.js';
import { appendRecords } from '../sink/csv-sink.js';
import { detailUrl, entitiesListingUrl } from '../utils/url.js';
import type { HarvestContext } from './context.js';
import type { PhaseSummary } from './summary.js';

/** The fighter index is partitioned by the first letter of the last name. */
export const INDEX_LETTERS = 'abcdefghijklmnopqrstuvwxyz'.split('');

const entityList = new EntityListParser();
const entityDetail = new EntityDetailParser();

export async function enumerateEntityIds(ctx: HarvestContext): Promise<string[]> {
  const run = await runBounded(
    INDEX_LETTERS,
    async (letter) => entityList.parse(await ctx.http.fetchDocument(entitiesListingUrl(ctx.baseUrl, letter))),
    {
      concurrency: ctx.enumerationPoolSize,
      label: 'entity-list',
      describe: (letter) => entitiesListingUrl(ctx.baseUrl, letter),
      log: ctx.log,
    },
  );
  return [...new Set(run.results)];
}

export async function harvestEntities(ctx: HarvestContext): Promise<PhaseSummary> {
  const log = ctx.log.child({ phase: 'entities' });

  const ids = await enumerateEntityIds(ctx);
  const store = await DedupStore.load(datasetPath(ctx.outputDir, ENTITIES), ENTITIES.keyColumn);
  const pending = ids.filter((id) => !store.has(id));
  log.info(
    { listed: ids.length, pending: pending.length, alreadyPresent: ids.length - pending.length },
    'Entities enumerated',
  );

  const today = ctx.now();
  const run = await runBounded(
    pending,
    async (entityId) => {
      const $ = await ctx.http.fetchDocument(detailUrl(ctx.baseUrl, 'fighter-details', entityId));
      return entityDetail.parse($, { entityId, today });
    },
    {
      concurrency: ctx.workerPoolSize,
      label: 'entity-detail',
      describe: (entityId) => entityId,
      log,
    },
  );

  const fresh = run.results.filter((entity) => {
    const id = ENTITIES.keyOf(entity);
    if (store.has(id)) return false;
    store.add(id);
    return true;
  });
  const written = await appendRecords(ctx.outputDir, ENTITIES, fresh);
  log.info({ written }, 'Entities persisted');

  return {
    dataset: ENTITIES.name,
    candidates: ids.length,
    alreadyPresent: ids.length - pending.length,
    written,
    failed: run.failures.length,
  };
}
