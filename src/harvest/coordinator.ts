import fs from 'node:fs/promises';
import { harvestContestResults } from './contest-results-phase.js';
import { harvestContests } from './contests-phase.js';
import { harvestEntities } from './entities-phase.js';
import type { HarvestContext } from './context.js';
import type { PhaseSummary } from './summary.js';

export const HARVEST_TARGETS = ['entities', 'contests'] as const;
export type HarvestTarget = (typeof HARVEST_TARGETS)[number];

export function isHarvestTarget(value: string): value is HarvestTarget {
  return HARVEST_TARGETS.some((target) => target === value);
}

/**
 * Run the requested harvests one after another. Within each, phases run in
 * sequence; only the detail fetches inside a phase run concurrently.
 */
export async function runHarvest(
  ctx: HarvestContext,
  targets: readonly HarvestTarget[] = HARVEST_TARGETS,
): Promise<PhaseSummary[]> {
  await fs.mkdir(ctx.outputDir, { recursive: true });
  ctx.log.info({ outputDir: ctx.outputDir, targets }, 'Harvest started');

  const summaries: PhaseSummary[] = [];
  for (const target of targets) {
    switch (target) {
      case 'entities':
        summaries.push(await harvestEntities(ctx));
        break;
      case 'contests':
        summaries.push(...(await harvestContests(ctx)));
        summaries.push(await harvestContestResults(ctx));
        break;
    }
  }

  for (const summary of summaries) {
    ctx.log.info(summary, 'Dataset summary');
  }
  return summaries;
}
