/** A completed event listed on the events index. */
export interface EventRecord {
  id: string;
  /** ISO-8601 (`YYYY-MM-DD`) when the listed date parses, otherwise the listed text. */
  date: string;
  sourceUrl: string;
}

/** One bout on an event card. */
export interface ContestRecord {
  id: string;
  eventId: string;
  eventDate: string;
  category: string;
  /**
   * Short method label only ("KO/TKO", "U-DEC"); the longer detail line shown
   * under it on the event page is not kept.
   */
  outcomeMethod: string;
  outcomeRound: string;
}

/** W, L, D, NC, or empty when the page shows no status. */
export type ParticipantOutcome = string;

export interface ParticipantResultRecord {
  contestId: string;
  participantId: string;
  outcome: ParticipantOutcome;
  strikeLanded: number;
  strikeAttempted: number;
  grappleLanded: number;
  grappleAttempted: number;
  submissionAttempts: number;
  controlSeconds: number;
}

/** A fighter profile. Every measured value is null when the page leaves it blank. */
export interface EntityRecord {
  id: string;
  name: string;
  nickname: string | null;
  recordWins: number | null;
  recordLosses: number | null;
  recordTies: number | null;
  heightIn: number | null;
  weightLb: number | null;
  reachIn: number | null;
  stance: string | null;
  age: number | null;
  strikesLandedPerMin: number | null;
  strikeAccuracy: number | null;
  strikesAbsorbedPerMin: number | null;
  strikeDefense: number | null;
  grappleAvg: number | null;
  grappleAccuracy: number | null;
  grappleDefense: number | null;
  submissionAvg: number | null;
}
