/**
 * Floating awards
 * Recomputed from the full history on every read; nothing here is persisted.
 * A holder today can lose the trophy tomorrow purely because new rounds were logged.
 */

import type { LeagueConfig } from "../constants.js";
import type { MatchRecord, Player } from "../types.js";
import { round1dp } from "../scoring/roundScoring.js";
import { holdersOf, resolveTie, type TieResolution } from "./headToHead.js";

export type AwardKey = "rock" | "sniper" | "conqueror" | "rocket";

export const AWARD_TITLES: Record<AwardKey, string> = {
  rock: "The Rock",
  sniper: "The Sniper",
  conqueror: "The Conqueror",
  rocket: "The Rocket",
};

export const AWARD_ICONS: Record<AwardKey, string> = {
  rock: "🪨",
  sniper: "🎯",
  conqueror: "⚔️",
  rocket: "🚀",
};

export interface AwardResult {
  key: AwardKey;
  title: string;
  /** Empty when vacant; several names when the head-to-head left a tie */
  holders: string[];
  resolution: TieResolution | null;
  /** Bonus actually paid: only a single resolved holder collects */
  bonusPaid: number;
  stat: string;
}

export interface AwardsSnapshot {
  awards: Partial<Record<AwardKey, AwardResult>>;
  /** name -> sum of award bonuses paid in this snapshot */
  bonuses: Record<string, number>;
}

export interface AwardInput {
  rounds: MatchRecord[];
  players: Player[];
  /** YYYY-MM-DD; anchors the Sniper's month window */
  asOf: string;
  /** History used for tie-breaks. Defaults to `rounds`. */
  history?: MatchRecord[];
  /** Which awards to compute. Defaults to all four. */
  only?: AwardKey[];
}

// --- HELPERS ---

function vacant(key: AwardKey, stat: string): AwardResult {
  return { key, title: AWARD_TITLES[key], holders: [], resolution: null, bonusPaid: 0, stat };
}

function award(key: AwardKey, candidates: string[], history: MatchRecord[], bonus: number, stat: string): AwardResult {
  const resolution = resolveTie(candidates, history);
  return {
    key,
    title: AWARD_TITLES[key],
    holders: holdersOf(resolution),
    resolution,
    bonusPaid: resolution.kind === "winner" ? bonus : 0,
    stat,
  };
}

/** Candidates sharing the best value of a metric, in first-seen order */
function leaders(values: Map<string, number>, better: (a: number, b: number) => boolean): { best: number; names: string[] } {
  let best: number | null = null;
  for (const v of values.values()) {
    if (best === null || better(v, best)) best = v;
  }
  if (best === null) return { best: 0, names: [] };
  const target = best;
  return { best: target, names: [...values.entries()].filter(([, v]) => v === target).map(([name]) => name) };
}

function isFullStablefordRound(r: MatchRecord): boolean {
  return r.matchType === "Standard" && r.holesPlayed === 18;
}

// --- AWARDS ---

/** The Rock: highest mean Stableford over 18-hole rounds, minimum round count */
export function computeRock(rounds: MatchRecord[], history: MatchRecord[], config: LeagueConfig): AwardResult {
  const rule = config.awards.rock;
  const totals = new Map<string, { sum: number; count: number }>();
  for (const r of rounds.filter(isFullStablefordRound)) {
    const t = totals.get(r.playerName) ?? { sum: 0, count: 0 };
    t.sum += r.stablefordScore;
    t.count += 1;
    totals.set(r.playerName, t);
  }

  const averages = new Map<string, number>();
  for (const [name, t] of totals) {
    if (t.count >= rule.minRounds) averages.set(name, t.sum / t.count);
  }
  if (averages.size === 0) return vacant("rock", `Min ${rule.minRounds} Rnds`);

  const { best, names } = leaders(averages, (a, b) => a > b);
  return award("rock", names, history, rule.bonus, `${best.toFixed(2)} Avg`);
}

/** The Sniper: lowest gross strokes above the noise floor, optionally this month only */
export function computeSniper(rounds: MatchRecord[], history: MatchRecord[], asOf: string, config: LeagueConfig): AwardResult {
  const rule = config.awards.sniper;
  const month = asOf.slice(0, 7);

  const lowest = new Map<string, number>();
  for (const r of rounds) {
    if (!(isFullStablefordRound(r) || r.matchType === "Duel")) continue;
    if (r.grossScore <= rule.grossFloor) continue;
    if (rule.window === "month" && !r.date.startsWith(month)) continue;
    const prev = lowest.get(r.playerName);
    if (prev === undefined || r.grossScore < prev) lowest.set(r.playerName, r.grossScore);
  }
  if (lowest.size === 0) return vacant("sniper", "No Rounds");

  const { best, names } = leaders(lowest, (a, b) => a < b);
  return award("sniper", names, history, rule.bonus, `${best} Strokes`);
}

/** The Conqueror: most wins (winner of the day, duel or alliance wins) */
export function computeConqueror(rounds: MatchRecord[], history: MatchRecord[], config: LeagueConfig): AwardResult {
  const rule = config.awards.conqueror;
  const wins = new Map<string, number>();
  for (const r of rounds) {
    if (r.outcome === "Win") wins.set(r.playerName, (wins.get(r.playerName) ?? 0) + 1);
  }

  const eligible = new Map([...wins].filter(([, n]) => n >= rule.minWins));
  if (eligible.size === 0) return vacant("conqueror", `Min ${rule.minWins} Wins`);

  const { best, names } = leaders(eligible, (a, b) => a > b);
  return award("conqueror", names, history, rule.bonus, `${best} Wins`);
}

/** The Rocket: biggest drop from starting handicap, minimum rounds played */
export function computeRocket(players: Player[], history: MatchRecord[], config: LeagueConfig): AwardResult {
  const rule = config.awards.rocket;
  const eligible = players.filter((p) => p.roundsPlayed >= rule.minRounds);
  if (eligible.length === 0) return vacant("rocket", `Min ${rule.minRounds} Rnds`);

  const progress = new Map(eligible.map((p) => [p.name, round1dp(p.startingHandicap - p.handicap)]));
  const { best, names } = leaders(progress, (a, b) => a > b);
  if (best <= 0) return vacant("rocket", "No Drop");

  return award("rocket", names, history, rule.bonus, `-${best.toFixed(1)}`);
}

/**
 * Computes every requested award independently. Pure: the same input always
 * yields the same holders and bonuses.
 */
export function computeAwards(input: AwardInput, config: LeagueConfig): AwardsSnapshot {
  const history = input.history ?? input.rounds;
  const only = new Set<AwardKey>(input.only ?? ["rock", "sniper", "conqueror", "rocket"]);

  const awards: Partial<Record<AwardKey, AwardResult>> = {};
  if (only.has("sniper")) awards.sniper = computeSniper(input.rounds, history, input.asOf, config);
  if (only.has("rock")) awards.rock = computeRock(input.rounds, history, config);
  if (only.has("rocket")) awards.rocket = computeRocket(input.players, history, config);
  if (only.has("conqueror")) awards.conqueror = computeConqueror(input.rounds, history, config);

  const bonuses: Record<string, number> = {};
  for (const p of input.players) bonuses[p.name] = 0;
  for (const result of Object.values(awards)) {
    if (result && result.bonusPaid > 0) {
      const holder = result.holders[0];
      bonuses[holder] = (bonuses[holder] ?? 0) + result.bonusPaid;
    }
  }

  return { awards, bonuses };
}
