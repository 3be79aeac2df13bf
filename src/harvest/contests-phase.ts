import { CONTESTS, EVENTS, datasetPath } from '../datasets.js';
import { describeError } from '../errors.js';
import { DedupStore } from '../pipeline/dedup.js';
import { runBounded } from '../pipeline/task-runner.js';
import { EventDetailParser } from '../parsers/event-detail.js';
import { EventListParser } from '../parsers/event-list.js';
import { appendRecords } from '../sink/csv-sink.js';
import { eventsListingUrl } from '../utils/url.js';
import type { ContestRecord, EventRecord } from '../types/records.js';
import type { HarvestContext } from './context.js';
import type { PhaseSummary } from './summary.js';

const eventList = new EventListParser();
const eventDetail = new EventDetailParser();

interface EventCard {
  event: EventRecord;
  contests: ContestRecord[];
}

/** All completed events on the index, first occurrence of each id kept. */
export async function enumerateEvents(ctx: HarvestContext): Promise<EventRecord[]> {
  const url = eventsListingUrl(ctx.baseUrl);
  try {
    const $ = await ctx.http.fetchDocument(url);
    const byId = new Map<string, EventRecord>();
    for (const event of eventList.parse($)) {
      if (!byId.has(event.id)) byId.set(event.id, event);
    }
    return [...byId.values()];
  } catch (err) {
    ctx.log.error({ url, err: describeError(err) }, 'Events listing failed');
    return [];
  }
}

/**
 * Events → contests.
 *
 * Event cards already recorded in `events.csv` are not fetched again. An event
 * row is appended only after its contests are, and only when its card listed
 * at least one bout, so an interrupted or empty card is picked up next run.
 */
export async function harvestContests(ctx: HarvestContext): Promise<PhaseSummary[]> {
  const log = ctx.log.child({ phase: 'contests' });

  const events = await enumerateEvents(ctx);
  const eventStore = await DedupStore.load(datasetPath(ctx.outputDir, EVENTS), EVENTS.keyColumn);
  const pending = events.filter((event) => !eventStore.has(EVENTS.keyOf(event)));
  log.info(
    { listed: events.length, pending: pending.length, alreadyPresent: events.length - pending.length },
    'Events enumerated',
  );

  const run = await runBounded<EventRecord, EventCard>(
    pending,
    async (event) => {
      const $ = await ctx.http.fetchDocument(event.sourceUrl);
      const contests = [...eventDetail.parse($, { eventId: event.id, eventDate: event.date })];
      return [{ event, contests }];
    },
    {
      concurrency: ctx.workerPoolSize,
      label: 'event-detail',
      describe: (event) => event.sourceUrl,
      log,
    },
  );

  const contestStore = await DedupStore.load(
    datasetPath(ctx.outputDir, CONTESTS),
    CONTESTS.keyColumn,
  );
  const alreadyPresent = contestStore.size;
  const fresh: ContestRecord[] = [];
  for (const { contests } of run.results) {
    for (const contest of contests) {
      const id = CONTESTS.keyOf(contest);
      if (contestStore.has(id)) continue;
      contestStore.add(id);
      fresh.push(contest);
    }
  }

  const contestsWritten = await appendRecords(ctx.outputDir, CONTESTS, fresh);
  const completedEvents = run.results
    .filter((card) => card.contests.length > 0)
    .map((card) => card.event);
  const eventsWritten = await appendRecords(ctx.outputDir, EVENTS, completedEvents);

  const emptyCards = run.results.length - completedEvents.length;
  if (emptyCards > 0) {
    log.warn({ count: emptyCards }, 'Event cards without bouts left for the next run');
  }
  log.info({ events: eventsWritten, contests: contestsWritten }, 'Contests persisted');

  return [
    {
      dataset: EVENTS.name,
      candidates: events.length,
      alreadyPresent: events.length - pending.length,
      written: eventsWritten,
      failed: run.failures.length,
    },
    {
      dataset: CONTESTS.name,
      candidates: contestStore.size,
      alreadyPresent,
      written: contestsWritten,
      failed: run.failures.length,
    },
  ];
}
