import type { CheerioAPI } from 'cheerio';
import { BasePageParser } from './base-parser.js';
import { idFromUrl } from '../utils/url.js';

/** Fighter index for one letter (`/statistics/fighters?char=a&page=all`); yields fighter ids. */
export class EntityListParser extends BasePageParser<string> {
  readonly name = 'entity-list';

  *parse($: CheerioAPI): Generator<string> {
    const tbody = $('table').first().find('tbody').first();
    if (tbody.length === 0) return;

    const seen = new Set<string>();
    for (const row of tbody.find('tr').toArray()) {
      const href = $(row).find('a[href]').first().attr('href');
      if (!href) continue;
      const id = idFromUrl(href);
      if (!id || seen.has(id)) continue;
      seen.add(id);
      yield id;
    }
  }
}
