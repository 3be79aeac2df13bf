import type { CheerioAPI } from 'cheerio';
import { BasePageParser } from './base-parser.js';
import {
  cleanText,
  parseAge,
  parseDecimal,
  parseHeight,
  parsePercentage,
  parseReach,
  parseRecord,
  parseWeight,
} from '../pipeline/normalizer.js';
import type { EntityRecord } from '../types/records.js';
import type { EntityPageContext } from '../types/parser.js';

/**
 * Fighter profile (`/fighter-details/<id>`).
 *
 * Bio and career averages share one markup pattern,
 * `<li class="b-list__box-list-item"><i>Label:</i> value</li>`, so they are
 * collected into a label → value map first and converted afterwards.
 */
export class EntityDetailParser extends BasePageParser<EntityRecord, EntityPageContext> {
  readonly name = 'entity-detail';

  *parse($: CheerioAPI, { entityId, today }: EntityPageContext): Generator<EntityRecord> {
    const nameEl = $('span.b-content__title-highlight').first();
    if (nameEl.length === 0) return;

    const record = parseRecord(this.textOf($('span.b-content__title-record').first()));
    const stats = this.labelledValues($);

    yield {
      id: entityId,
      name: this.textOf(nameEl),
      nickname: cleanText(this.textOf($('p.b-content__Nickname').first())),
      recordWins: record.wins,
      recordLosses: record.losses,
      recordTies: record.ties,
      heightIn: parseHeight(stats.get('Height')),
      weightLb: parseWeight(stats.get('Weight')),
      reachIn: parseReach(stats.get('Reach')),
      stance: cleanText(stats.get('STANCE')),
      age: parseAge(stats.get('DOB'), today),
      strikesLandedPerMin: parseDecimal(stats.get('SLpM')),
      strikeAccuracy: parsePercentage(stats.get('Str. Acc.')),
      strikesAbsorbedPerMin: parseDecimal(stats.get('SApM')),
      strikeDefense: parsePercentage(stats.get('Str. Def')),
      grappleAvg: parseDecimal(stats.get('TD Avg.')),
      grappleAccuracy: parsePercentage(stats.get('TD Acc.')),
      grappleDefense: parsePercentage(stats.get('TD Def.')),
      submissionAvg: parseDecimal(stats.get('Sub. Avg.')),
    };
  }

  private labelledValues($: CheerioAPI): Map<string, string> {
    const values = new Map<string, string>();

    for (const item of $('li.b-list__box-list-item').toArray()) {
      const $item = $(item);
      const label = $item.find('i').first();
      if (label.length === 0) continue;

      const labelText = this.textOf(label);
      const key = labelText.replaceAll(':', '').trim();
      if (!key) continue;

      values.set(key, this.textOf($item).replace(labelText, '').trim());
    }

    return values;
  }
}
