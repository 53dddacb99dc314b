/**
 * League rule tables.
 * Every threshold and bonus size the engine uses lives here; the engine
 * receives them as a LeagueConfig and never reads these constants directly.
 */

// =============================================================================
// TYPES
// =============================================================================

/** One row of the handicap adjustment table (scores are inclusive, null = open-ended) */
export interface HandicapBand {
  min: number | null;
  max: number | null;
  delta: number;
}

/** Winner-of-day pot for a cohort of at least `minPlayers` */
export interface PotTier {
  minPlayers: number;
  pot: number;
}

export type PotSplitMode = "exact" | "ceil";

export interface AwardRule {
  bonus: number;
}

export interface LeagueConfig {
  scoring: {
    targetStableford: { 18: number; 9: number };
    participation: { 18: number; 9: number };
    /** Max participation RP per player per season; null = uncapped */
    participationSeasonCap: number | null;
    performanceMultiplier: number;
    cleanSheetBonus: number;
    holeInOneBonus: number;
    roadWarriorBonus: number;
  };
  handicap: {
    sandbaggerThreshold: number;
    /** Largest single-round cut under the sandbagger rule; null = uncapped */
    sandbaggerMaxCut: number | null;
    bands: HandicapBand[];
  };
  group: {
    /** Evaluated from the largest minPlayers down */
    potTiers: PotTier[];
    nineHolePotFactor: number;
    potSplit: PotSplitMode;
    giantSlayerBonus: number;
  };
  rivalry: {
    duelFavoriteStake: number;
    duelUpsetStake: number;
    allianceStake: number;
    duoDebutBonus: number;
  };
  awards: {
    rock: AwardRule & { minRounds: number };
    sniper: AwardRule & { grossFloor: number; window: "all" | "month" };
    conqueror: AwardRule & { minWins: number };
    rocket: AwardRule & { minRounds: number };
  };
  /** RP paid to 1st..Nth of a closed season */
  podiumRewards: number[];
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_HANDICAP_BANDS: HandicapBand[] = [
  { min: 40, max: null, delta: -2.0 },
  { min: 37, max: 39, delta: -1.0 },
  { min: 27, max: 36, delta: 0 },
  { min: null, max: 26, delta: 1.0 },
];

/**
 * Finer table used by later league revisions. Not the default; pass it as
 * `handicap.bands` to switch.
 */
export const EXTENDED_HANDICAP_BANDS: HandicapBand[] = [
  { min: 45, max: null, delta: -5.0 },
  { min: 40, max: 44, delta: -2.0 },
  { min: 37, max: 39, delta: -1.0 },
  { min: 34, max: 36, delta: 0 },
  { min: 30, max: 33, delta: 1.0 },
  { min: null, max: 29, delta: 2.0 },
];

export const DEFAULT_LEAGUE_CONFIG: LeagueConfig = {
  scoring: {
    targetStableford: { 18: 36, 9: 18 },
    participation: { 18: 2, 9: 1 },
    participationSeasonCap: null,
    performanceMultiplier: 2,
    cleanSheetBonus: 2,
    holeInOneBonus: 10,
    roadWarriorBonus: 2,
  },
  handicap: {
    sandbaggerThreshold: 36,
    sandbaggerMaxCut: null,
    bands: DEFAULT_HANDICAP_BANDS,
  },
  group: {
    potTiers: [
      { minPlayers: 4, pot: 6 },
      { minPlayers: 3, pot: 4 },
      { minPlayers: 2, pot: 2 },
    ],
    nineHolePotFactor: 0.5,
    potSplit: "exact",
    giantSlayerBonus: 1,
  },
  rivalry: {
    duelFavoriteStake: 5,
    duelUpsetStake: 10,
    allianceStake: 5,
    duoDebutBonus: 5,
  },
  awards: {
    rock: { bonus: 10, minRounds: 5 },
    sniper: { bonus: 5, grossFloor: 20, window: "all" },
    conqueror: { bonus: 10, minWins: 3 },
    rocket: { bonus: 10, minRounds: 3 },
  },
  podiumRewards: [15, 10, 7, 4, 2],
};

// =============================================================================
// FIRESTORE
// =============================================================================

export const PLAYERS_COLLECTION = "players";
export const MATCH_RECORDS_COLLECTION = "matchRecords";

/** Firestore caps a batch at 500 writes */
export const MAX_BATCH_WRITES = 500;
