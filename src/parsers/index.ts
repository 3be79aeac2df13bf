export { BasePageParser } from './base-parser.js';
export { EventListParser } from './event-list.js';
export { EventDetailParser } from './event-detail.js';
export { ContestDetailParser } from './contest-detail.js';
export { EntityListParser } from './entity-list.js';
export { EntityDetailParser } from './entity-detail.js';
