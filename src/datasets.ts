import path from 'node:path';
import type {
  ContestRecord,
  EntityRecord,
  EventRecord,
  ParticipantResultRecord,
} from './types/records.js';

export type CsvValue = string | number | null;

export interface DatasetDefinition<R, C extends string = string> {
  readonly name: string;
  readonly fileName: string;
  readonly columns: readonly C[];
  /** Column holding the id the dedup store tracks. */
  readonly keyColumn: C;
  keyOf(record: R): string;
  toRow(record: R): Record<C, CsvValue>;
}

export function datasetPath(outputDir: string, dataset: { fileName: string }): string {
  return path.join(outputDir, dataset.fileName);
}

type EventColumn = 'event_id' | 'event_date' | 'source_url';

export const EVENTS: DatasetDefinition<EventRecord, EventColumn> = {
  name: 'events',
  fileName: 'events.csv',
  columns: ['event_id', 'event_date', 'source_url'],
  keyColumn: 'event_id',
  keyOf: (event) => event.id,
  toRow: (event) => ({
    event_id: event.id,
    event_date: event.date,
    source_url: event.sourceUrl,
  }),
};

type ContestColumn =
  | 'contest_id'
  | 'event_date'
  | 'category'
  | 'outcome_method'
  | 'outcome_round';

export const CONTESTS: DatasetDefinition<ContestRecord, ContestColumn> = {
  name: 'contests',
  fileName: 'contests.csv',
  columns: ['contest_id', 'event_date', 'category', 'outcome_method', 'outcome_round'],
  keyColumn: 'contest_id',
  keyOf: (contest) => contest.id,
  toRow: (contest) => ({
    contest_id: contest.id,
    event_date: contest.eventDate,
    category: contest.category,
    outcome_method: contest.outcomeMethod,
    outcome_round: contest.outcomeRound,
  }),
};

type ResultColumn =
  | 'contest_id'
  | 'participant_id'
  | 'outcome'
  | 'strike_landed'
  | 'strike_attempted'
  | 'grapple_landed'
  | 'grapple_attempted'
  | 'submission_attempts'
  | 'control_seconds';

// Keyed by contest: both participant rows of a contest are written together.
export const CONTEST_RESULTS: DatasetDefinition<ParticipantResultRecord, ResultColumn> = {
  name: 'contest_results',
  fileName: 'contest_results.csv',
  columns: [
    'contest_id',
    'participant_id',
    'outcome',
    'strike_landed',
    'strike_attempted',
    'grapple_landed',
    'grapple_attempted',
    'submission_attempts',
    'control_seconds',
  ],
  keyColumn: 'contest_id',
  keyOf: (result) => result.contestId,
  toRow: (result) => ({
    contest_id: result.contestId,
    participant_id: result.participantId,
    outcome: result.outcome,
    strike_landed: result.strikeLanded,
    strike_attempted: result.strikeAttempted,
    grapple_landed: result.grappleLanded,
    grapple_attempted: result.grappleAttempted,
    submission_attempts: result.submissionAttempts,
    control_seconds: result.controlSeconds,
  }),
};

type EntityColumn =
  | 'id'
  | 'name'
  | 'nickname'
  | 'record_wins'
  | 'record_losses'
  | 'record_ties'
  | 'height_in'
  | 'weight_lb'
  | 'reach_in'
  | 'stance'
  | 'age'
  | 'strikes_landed_per_min'
  | 'strike_accuracy'
  | 'strikes_absorbed_per_min'
  | 'strike_defense'
  | 'grapple_avg'
  | 'grapple_accuracy'
  | 'grapple_defense'
  | 'submission_avg';

export const ENTITIES: DatasetDefinition<EntityRecord, EntityColumn> = {
  name: 'entities',
  fileName: 'entities.csv',
  columns: [
    'id',
    'name',
    'nickname',
    'record_wins',
    'record_losses',
    'record_ties',
    'height_in',
    'weight_lb',
    'reach_in',
    'stance',
    'age',
    'strikes_landed_per_min',
    'strike_accuracy',
    'strikes_absorbed_per_min',
    'strike_defense',
    'grapple_avg',
    'grapple_accuracy',
    'grapple_defense',
    'submission_avg',
  ],
  keyColumn: 'id',
  keyOf: (entity) => entity.id,
  toRow: (entity) => ({
    id: entity.id,
    name: entity.name,
    nickname: entity.nickname,
    record_wins: entity.recordWins,
    record_losses: entity.recordLosses,
    record_ties: entity.recordTies,
    height_in: entity.heightIn,
    weight_lb: entity.weightLb,
    reach_in: entity.reachIn,
    stance: entity.stance,
    age: entity.age,
    strikes_landed_per_min: entity.strikesLandedPerMin,
    strike_accuracy: entity.strikeAccuracy,
    strikes_absorbed_per_min: entity.strikesAbsorbedPerMin,
    strike_defense: entity.strikeDefense,
    grapple_avg: entity.grappleAvg,
    grapple_accuracy: entity.grappleAccuracy,
    grapple_defense: entity.grappleDefense,
    submission_avg: entity.submissionAvg,
  }),
};
