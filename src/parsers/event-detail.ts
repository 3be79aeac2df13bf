import type { CheerioAPI } from 'cheerio';
import { BasePageParser } from './base-parser.js';
import { idFromUrl } from '../utils/url.js';
import type { ContestRecord } from '../types/records.js';
import type { EventPageContext } from '../types/parser.js';

const MIN_CELLS = 10;
const CATEGORY_CELL = 6;
const METHOD_CELL = 7;
const ROUND_CELL = 8;

/**
 * Event card (`/event-details/<id>`). One bout per `tr[data-link]` in
 * `table.b-fight-details__table`; cells are
 * W/L, fighters, KD, STR, TD, SUB, weight class, method, round, time.
 */
export class EventDetailParser extends BasePageParser<ContestRecord, EventPageContext> {
  readonly name = 'event-detail';

  *parse($: CheerioAPI, { eventId, eventDate }: EventPageContext): Generator<ContestRecord> {
    const tbody = $('table.b-fight-details__table').first().find('tbody').first();
    if (tbody.length === 0) return;

    for (const row of tbody.find('tr').toArray()) {
      const $row = $(row);
      const link = $row.attr('data-link')?.trim();
      if (!link) continue;

      const cells = $row.children('td').toArray();
      if (cells.length < MIN_CELLS) continue;

      const methodCell = cells[METHOD_CELL];
      const [method] = this.paragraphTexts($, methodCell);

      yield {
        id: idFromUrl(link),
        eventId,
        eventDate,
        category: this.cellText($, cells[CATEGORY_CELL]),
        outcomeMethod: method ?? this.cellText($, methodCell),
        outcomeRound: this.cellText($, cells[ROUND_CELL]),
      };
    }
  }
}
