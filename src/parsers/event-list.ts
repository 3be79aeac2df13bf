import type { CheerioAPI } from 'cheerio';
import { BasePageParser } from './base-parser.js';
import { parseEventDate } from '../pipeline/normalizer.js';
import { idFromUrl } from '../utils/url.js';
import type { EventRecord } from '../types/records.js';

/**
 * Completed-events index (`/statistics/events/completed?page=all`).
 *
 * Rows live in `table.b-statistics__table-events`; each usable row carries the
 * event link (`a.b-link`) and its date (`span.b-statistics__date`). The header
 * row and the "upcoming" placeholder row have neither and are skipped.
 */
export class EventListParser extends BasePageParser<EventRecord> {
  readonly name = 'event-list';

  *parse($: CheerioAPI): Generator<EventRecord> {
    const table = $('table.b-statistics__table-events').first();
    if (table.length === 0) return;

    for (const row of table.find('tr.b-statistics__table-row').toArray()) {
      const $row = $(row);
      const href = $row.find('a.b-link').first().attr('href')?.trim();
      const dateSpan = $row.find('span.b-statistics__date').first();
      if (!href || dateSpan.length === 0) continue;

      const id = idFromUrl(href);
      if (!id) continue;

      yield {
        id,
        date: parseEventDate(this.textOf(dateSpan)),
        sourceUrl: href,
      };
    }
  }
}
