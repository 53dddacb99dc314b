/**
 * Individual round scoring
 * Converts one player's Stableford performance into ranking points and a new handicap
 */

import type { HandicapBand, LeagueConfig } from "../constants.js";
import type { HolesPlayed } from "../types.js";

// --- HELPERS ---

/** Rounds .5 away from zero: 4.5 -> 5, -4.5 -> -5 */
export function roundHalfAwayFromZero(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}

export function round1dp(x: number): number {
  return roundHalfAwayFromZero(x * 10) / 10;
}

/** RP is held to hundredths so stored totals add and subtract back exactly */
export function roundRp(x: number): number {
  return roundHalfAwayFromZero(x * 100) / 100;
}

/** Formats RP for notes: integers stay bare, fractions keep up to 6 significant digits */
export function formatRp(value: number): string {
  return String(Number(value.toPrecision(6)));
}

function signed(value: number): string {
  return value >= 0 ? `+${formatRp(value)}` : formatRp(value);
}

/** "Label (+n)" trail entry */
export function trailEntry(label: string, value: number): string {
  return `${label} (${signed(value)})`;
}

// --- ROUND POINTS ---

export interface RoundScoreInput {
  stableford: number;
  holesPlayed: HolesPlayed;
  cleanSheet?: boolean;
  holeInOne?: boolean;
  roadWarrior?: boolean;
  /** Participation RP still available under the season cap; undefined = uncapped */
  participationRemaining?: number;
  /** Cohort bonuses (winner of day, giant slayer) computed by the caller */
  extraBonus?: number;
  extraTrail?: string[];
}

export interface RoundScore {
  baseRp: number;
  performance: number;
  participation: number;
  trail: string;
}

/**
 * Stableford performance term.
 * At or above target every point is worth `multiplier` RP; below target the
 * deficit is halved and rounded half away from zero (-9 -> -5).
 */
export function performancePoints(stableford: number, target: number, multiplier: number): number {
  const diff = stableford - target;
  if (diff >= 0) return diff * multiplier;
  return roundHalfAwayFromZero(diff / 2);
}

export function scoreRound(input: RoundScoreInput, config: LeagueConfig): RoundScore {
  const rules = config.scoring;
  const target = rules.targetStableford[input.holesPlayed];

  const performance = performancePoints(input.stableford, target, rules.performanceMultiplier);

  const fullParticipation = rules.participation[input.holesPlayed];
  const participation =
    input.participationRemaining === undefined
      ? fullParticipation
      : Math.min(fullParticipation, Math.max(0, input.participationRemaining));

  const trail = [trailEntry("Stbl Perf", performance)];
  trail.push(
    participation < fullParticipation ? `Part (${signed(participation)}, Season Cap)` : trailEntry("Part", participation)
  );
  trail.push(...(input.extraTrail ?? []));

  let bonuses = input.extraBonus ?? 0;
  if (input.roadWarrior) {
    bonuses += rules.roadWarriorBonus;
    trail.push(trailEntry("Road Warrior", rules.roadWarriorBonus));
  }
  if (input.cleanSheet) {
    bonuses += rules.cleanSheetBonus;
    trail.push(trailEntry("Clean Sheet", rules.cleanSheetBonus));
  }
  if (input.holeInOne) {
    bonuses += rules.holeInOneBonus;
    trail.push(trailEntry("Hole-in-One", rules.holeInOneBonus));
  }

  return {
    baseRp: roundRp(participation + performance + bonuses),
    performance,
    participation,
    trail: trail.join(", "),
  };
}

// --- HANDICAP ---

function bandMatches(band: HandicapBand, score: number): boolean {
  if (band.min !== null && score < band.min) return false;
  if (band.max !== null && score > band.max) return false;
  return true;
}

/**
 * Post-round handicap.
 * Above the sandbagger threshold a score over 36 cuts one stroke per point;
 * everything else goes through the band table (first match wins).
 * Result is rounded to 1 decimal and never below 0.
 */
export function newHandicap(currentHandicap: number, stablefordScore: number, config: LeagueConfig): number {
  const rules = config.handicap;
  const current = round1dp(currentHandicap);
  const score = round1dp(stablefordScore);

  let next = current;
  if (current > rules.sandbaggerThreshold && score > rules.sandbaggerThreshold) {
    const cut = score - rules.sandbaggerThreshold;
    next = current - (rules.sandbaggerMaxCut === null ? cut : Math.min(cut, rules.sandbaggerMaxCut));
  } else {
    const band = rules.bands.find((b) => bandMatches(b, score));
    if (band) next = current + band.delta;
  }

  return Math.max(0, round1dp(next));
}
