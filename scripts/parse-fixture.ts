/**
 * Run one page parser against a saved HTML file and print what it yields.
 * Usage: npx tsx scripts/parse-fixture.ts <parser> <file> [id]
 *
 *   npx tsx scripts/parse-fixture.ts contest-detail test/fixtures/ufcstats/fight-f001.html f001
 */
import fs from 'node:fs';
import {
  ContestDetailParser,
  EntityDetailParser,
  EntityListParser,
  EventDetailParser,
  EventListParser,
} from '../src/parsers/index.js';
import { idFromUrl } from '../src/utils/url.js';

const [parserName = '', file = '', idArg] = process.argv.slice(2);
if (!parserName || !file) {
  console.error('Usage: tsx scripts/parse-fixture.ts <parser> <file> [id]');
  process.exit(1);
}

const html = fs.readFileSync(file, 'utf-8');
const id = idArg ?? idFromUrl(file).replace(/\.html$/, '').replace(/^[a-z]+-/, '');

function run(): unknown[] {
  switch (parserName) {
    case 'event-list':
      return new EventListParser().parseHtml(html);
    case 'event-detail':
      return new EventDetailParser().parseHtml(html, { eventId: id, eventDate: '' });
    case 'contest-detail':
      return new ContestDetailParser().parseHtml(html, { contestId: id });
    case 'entity-list':
      return new EntityListParser().parseHtml(html);
    case 'entity-detail':
      return new EntityDetailParser().parseHtml(html, { entityId: id, today: new Date() });
    default:
      throw new Error(`Unknown parser: ${parserName}`);
  }
}

const records = run();
console.log(`${parserName}: ${records.length} record(s) from ${file}\n`);
records.forEach((record, i) => console.log(`[${i}]`, record));
