import type { CheerioAPI } from 'cheerio';

/**
 * Turns one fetched page into records. Implementations never throw on missing
 * markup: a page without the expected anchor produces no records.
 */
export interface PageParser<TRecord, TContext = void> {
  readonly name: string;
  parse($: CheerioAPI, context: TContext): Iterable<TRecord>;
}

export interface EventPageContext {
  eventId: string;
  eventDate: string;
}

export interface ContestPageContext {
  contestId: string;
}

export interface EntityPageContext {
  entityId: string;
  /** Reference date for computing age from the date of birth. */
  today: Date;
}
