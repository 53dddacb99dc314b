/**
 * Shared types for the league engine and Cloud Functions
 */

// ============================================================================
// ROUND FORMATS
// ============================================================================

export type MatchType = "Standard" | "Duel" | "Alliance";

export type HolesPlayed = 18 | 9;

/** Result of one participation event from the player's point of view */
export type MatchOutcome = "Win" | "Loss" | "Tie";

export type SeasonName = "Season 1" | "Season 2" | "Kings Cup" | "Season 3" | "Season 4" | "Finals";

/** Check if a match type is one of the rivalry formats (fixed stakes, no Stableford) */
export function isRivalryType(matchType: MatchType): boolean {
  return matchType === "Duel" || matchType === "Alliance";
}

// ============================================================================
// PERSISTED RECORDS
// ============================================================================

export interface Player {
  name: string;
  handicap: number;
  startingHandicap: number;
  roundsPlayed: number;
  totalRp: number;
}

/**
 * One row per player per participation event.
 * Every row written by a single submission shares its matchGroupId.
 */
export interface MatchRecord {
  playerName: string;
  date: string; // YYYY-MM-DD
  season: SeasonName;
  course: string;
  matchType: MatchType;
  holesPlayed: HolesPlayed;
  grossScore: number; // 0 when the format does not track strokes
  stablefordScore: number;
  rpEarned: number;
  participationRp: number;
  previousHandicap: number;
  newHandicap: number;
  notes: string;
  cleanSheet: boolean;
  holeInOne: boolean;
  isRivalry: boolean;
  outcome: MatchOutcome | null;
  holesWon: number | null; // Alliance only
  /** Missing on legacy rows; those fall back to date + course grouping */
  matchGroupId: string | null;
  createdAt: string; // ISO timestamp
}

/** Record as built by the engine, before the store assigns the group id */
export type MatchRecordDraft = Omit<MatchRecord, "matchGroupId">;

/** Aggregate change applied to a player in the same transaction as a submission */
export interface PlayerUpdate {
  name: string;
  handicap: number;
  rpDelta: number;
  roundsDelta: number;
}

/** Full replacement of a player's derived fields (repair path) */
export interface PlayerAggregates {
  name: string;
  handicap: number;
  roundsPlayed: number;
  totalRp: number;
}

export interface DeleteGroupResult {
  groupId: string;
  deletedRows: number;
  reversed: string[];
  /** Rows whose player no longer exists */
  skipped: string[];
}

// ============================================================================
// STANDINGS
// ============================================================================

/** name -> cumulative RP (history plus active award bonuses) at a point in time */
export type StandingsSnapshot = Record<string, number>;
