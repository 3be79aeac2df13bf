import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { PageParser } from '../types/parser.js';

export abstract class BasePageParser<TRecord, TContext = void>
  implements PageParser<TRecord, TContext>
{
  abstract readonly name: string;
  abstract parse($: CheerioAPI, context: TContext): Iterable<TRecord>;

  load(html: string): CheerioAPI {
    return cheerio.load(html);
  }

  /** Convenience for callers holding raw HTML: parse and materialize. */
  parseHtml(html: string, context: TContext): TRecord[] {
    return [...this.parse(this.load(html), context)];
  }

  protected textOf(selection: Cheerio<Element>): string {
    return selection.text().replace(/\s+/g, ' ').trim();
  }

  protected cellText($: CheerioAPI, cell: Element | undefined): string {
    return cell ? this.textOf($(cell)) : '';
  }

  /**
   * Stat cells stack one `<p>` per fighter, and the method cell stacks the
   * short method above its detail line.
   */
  protected paragraphTexts($: CheerioAPI, cell: Element | undefined): string[] {
    if (!cell) return [];
    return $(cell)
      .find('p')
      .toArray()
      .map((p) => this.textOf($(p)));
  }
}
