import type { CheerioAPI } from 'cheerio';
import { BasePageParser } from './base-parser.js';
import { parseControlTime, parseCount, parseFraction } from '../pipeline/normalizer.js';
import { idFromUrl } from '../utils/url.js';
import type { ParticipantResultRecord } from '../types/records.js';
import type { ContestPageContext } from '../types/parser.js';

interface Participant {
  id: string;
  outcome: string;
}

const MIN_CELLS = 10;
const STRIKES_CELL = 2;
const GRAPPLES_CELL = 5;
const SUBMISSIONS_CELL = 7;
const CONTROL_CELL = 9;

/**
 * Fight details (`/fight-details/<id>`).
 *
 * The two fighters are the `div.b-fight-details__person` blocks, in page order.
 * Totals come from the first row of the first table, where every cell stacks
 * one `<p>` per fighter in that same order. Anything other than exactly two
 * linked fighters yields nothing.
 */
export class ContestDetailParser extends BasePageParser<
  ParticipantResultRecord,
  ContestPageContext
> {
  readonly name = 'contest-detail';

  *parse($: CheerioAPI, { contestId }: ContestPageContext): Generator<ParticipantResultRecord> {
    const participants = this.participants($);
    if (participants.length !== 2) return;

    const row = $('table').first().find('tbody').first().find('tr').first();
    const cells = row.children('td').toArray();
    if (cells.length < MIN_CELLS) return;

    const strikes = this.paragraphTexts($, cells[STRIKES_CELL]);
    const grapples = this.paragraphTexts($, cells[GRAPPLES_CELL]);
    const submissions = this.paragraphTexts($, cells[SUBMISSIONS_CELL]);
    const control = this.paragraphTexts($, cells[CONTROL_CELL]);

    const results = participants.map((participant, index): ParticipantResultRecord => {
      const strike = parseFraction(strikes[index] ?? '');
      const grapple = parseFraction(grapples[index] ?? '');
      return {
        contestId,
        participantId: participant.id,
        outcome: participant.outcome,
        strikeLanded: strike.landed,
        strikeAttempted: strike.attempted,
        grappleLanded: grapple.landed,
        grappleAttempted: grapple.attempted,
        submissionAttempts: parseCount(submissions[index] ?? '0'),
        controlSeconds: parseControlTime(control[index] ?? '0:00'),
      };
    });

    yield* results;
  }

  private participants($: CheerioAPI): Participant[] {
    const participants: Participant[] = [];

    for (const block of $('div.b-fight-details__person').toArray()) {
      const $block = $(block);
      let link = $block.find('a.b-fight-details__person-link').first();
      if (link.length === 0) link = $block.find('a.b-link').first();

      const href = link.attr('href')?.trim();
      if (!href) continue;

      const status = $block.find('i.b-fight-details__person-status').first();
      participants.push({
        id: idFromUrl(href),
        outcome: status.length > 0 ? this.textOf(status) : '',
      });
    }

    return participants;
  }
}
