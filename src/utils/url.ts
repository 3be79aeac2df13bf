/**
 * Primary key of a detail page: the last path segment of its URL once
 * trailing slashes are dropped. `http://ufcstats.com/fight-details/abc123/` → `abc123`.
 */
export function idFromUrl(url: string): string {
  const segments = url.trim().replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] ?? '';
}

export type DetailResource = 'event-details' | 'fight-details' | 'fighter-details';

export function detailUrl(baseUrl: string, resource: DetailResource, id: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${resource}/${encodeURIComponent(id)}`;
}

export function eventsListingUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/statistics/events/completed?page=all`;
}

export function entitiesListingUrl(baseUrl: string, letter: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/statistics/fighters?char=${letter}&page=all`;
}
