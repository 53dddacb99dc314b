/**
 * Live standings
 * Lifetime RP plus the floating award overlay plus whatever closed seasons paid out.
 * Rebuilt from the full history on every read.
 */

import type { LeagueConfig } from "./constants.js";
import type { MatchRecord, Player, PlayerAggregates, SeasonName, StandingsSnapshot } from "./types.js";
import { computeAwards, type AwardKey, type AwardsSnapshot } from "./awards/awardEngine.js";
import { isSeasonClosed, parseIsoDate, SEASON_ORDER } from "./seasons.js";
import { roundRp } from "./scoring/roundScoring.js";

export interface StandingsRow {
  rank: number;
  name: string;
  handicap: number;
  roundsPlayed: number;
  lifetimeRp: number;
  /** Live floating awards */
  awardBonus: number;
  /** Closed seasons: season awards + podium */
  seasonBonus: number;
  totalRp: number;
  awards: AwardKey[];
  bestGross: number | null;
  averageStableford: number | null;
  duelRecord: string;
  allianceRecord: string;
  dailyWins: number;
}

export interface PodiumPlace {
  name: string;
  seasonRp: number;
  reward: number;
}

export interface ClosedSeason {
  key: string;
  year: number;
  season: SeasonName;
  awards: AwardsSnapshot;
  podium: PodiumPlace[];
  /** name -> season RP + season award bonuses */
  totals: Record<string, number>;
}

export interface Standings {
  asOf: string;
  rows: StandingsRow[];
  awards: AwardsSnapshot;
  closedSeasons: ClosedSeason[];
}

export interface StandingsInput {
  players: Player[];
  rounds: MatchRecord[];
  asOf: string;
}

// --- PLAYER RECORDS ---

/** "W-L" for duels, "W-L-T" for alliances */
export function playerRecord(rounds: MatchRecord[], name: string, matchType: "Duel" | "Alliance"): string {
  let wins = 0, losses = 0, ties = 0;
  for (const r of rounds) {
    if (r.playerName !== name || r.matchType !== matchType) continue;
    if (r.outcome === "Win") wins++;
    else if (r.outcome === "Loss") losses++;
    else if (r.outcome === "Tie") ties++;
  }
  return matchType === "Duel" ? `${wins}-${losses}` : `${wins}-${losses}-${ties}`;
}

/** Winner-of-day titles plus duel and alliance wins */
export function countDailyWins(rounds: MatchRecord[], name: string): number {
  return rounds.filter((r) => r.playerName === name && r.outcome === "Win").length;
}

function sumRp(rounds: MatchRecord[], name: string): number {
  return roundRp(rounds.reduce((sum, r) => (r.playerName === name ? sum + r.rpEarned : sum), 0));
}

function scoringSummary(rounds: MatchRecord[], name: string, grossFloor: number) {
  const mine = rounds.filter((r) => r.playerName === name);
  const stableford = mine.filter((r) => r.matchType === "Standard" && r.holesPlayed === 18);
  const gross = mine
    .filter((r) => ((r.matchType === "Standard" && r.holesPlayed === 18) || r.matchType === "Duel") && r.grossScore > grossFloor)
    .map((r) => r.grossScore);

  return {
    bestGross: gross.length > 0 ? Math.min(...gross) : null,
    averageStableford:
      stableford.length > 0 ? stableford.reduce((s, r) => s + r.stablefordScore, 0) / stableford.length : null,
  };
}

// --- CLOSED SEASONS ---

/**
 * Seasons whose last day is before `asOf`, oldest first. Each pays its own
 * award snapshot (tie-breaks still use the full history) and podium rewards.
 */
export function closedSeasons(input: StandingsInput, config: LeagueConfig): ClosedSeason[] {
  const buckets = new Map<string, { year: number; season: SeasonName; rows: MatchRecord[] }>();
  for (const r of input.rounds) {
    const parsed = parseIsoDate(r.date);
    if (!parsed) continue;
    const key = `${parsed.year} ${r.season}`;
    const bucket = buckets.get(key) ?? { year: parsed.year, season: r.season, rows: [] };
    bucket.rows.push(r);
    buckets.set(key, bucket);
  }

  const closed = [...buckets.entries()]
    .filter(([, b]) => isSeasonClosed(b.year, b.season, input.asOf))
    .sort(([, a], [, b]) => a.year - b.year || SEASON_ORDER.indexOf(a.season) - SEASON_ORDER.indexOf(b.season));

  return closed.map(([key, bucket]) => {
    const awards = computeAwards(
      {
        rounds: bucket.rows,
        players: input.players,
        asOf: input.asOf,
        history: input.rounds,
        only: ["sniper", "rock", "conqueror"],
      },
      // A closed season is judged on all of its rounds, never a month window
      { ...config, awards: { ...config.awards, sniper: { ...config.awards.sniper, window: "all" } } }
    );

    const totals: Record<string, number> = {};
    for (const p of input.players) {
      totals[p.name] = sumRp(bucket.rows, p.name) + (awards.bonuses[p.name] ?? 0);
    }

    const ranked = Object.entries(totals).sort(([na, a], [nb, b]) => b - a || na.localeCompare(nb));
    const podium: PodiumPlace[] = [];
    ranked.slice(0, config.podiumRewards.length).forEach(([name, seasonRp], i) => {
      if (seasonRp > 0) podium.push({ name, seasonRp, reward: config.podiumRewards[i] });
    });

    return { key, year: bucket.year, season: bucket.season, awards, podium, totals };
  });
}

// --- STANDINGS ---

export function buildStandings(input: StandingsInput, config: LeagueConfig): Standings {
  const awards = computeAwards({ rounds: input.rounds, players: input.players, asOf: input.asOf }, config);
  const seasons = closedSeasons(input, config);

  const seasonBonus = (name: string) =>
    seasons.reduce(
      (sum, s) => sum + (s.awards.bonuses[name] ?? 0) + (s.podium.find((p) => p.name === name)?.reward ?? 0),
      0
    );

  const heldAwards = (name: string): AwardKey[] =>
    (["sniper", "rock", "rocket", "conqueror"] as const).filter((key) => awards.awards[key]?.holders.includes(name));

  const rows: StandingsRow[] = input.players.map((p) => {
    const lifetimeRp = sumRp(input.rounds, p.name);
    const awardBonus = awards.bonuses[p.name] ?? 0;
    const bonusFromSeasons = seasonBonus(p.name);
    const summary = scoringSummary(input.rounds, p.name, config.awards.sniper.grossFloor);
    return {
      rank: 0,
      name: p.name,
      handicap: p.handicap,
      roundsPlayed: p.roundsPlayed,
      lifetimeRp,
      awardBonus,
      seasonBonus: bonusFromSeasons,
      totalRp: roundRp(lifetimeRp + awardBonus + bonusFromSeasons),
      awards: heldAwards(p.name),
      bestGross: summary.bestGross,
      averageStableford: summary.averageStableford,
      duelRecord: playerRecord(input.rounds, p.name, "Duel"),
      allianceRecord: playerRecord(input.rounds, p.name, "Alliance"),
      dailyWins: countDailyWins(input.rounds, p.name),
    };
  });

  rows.sort((a, b) => b.totalRp - a.totalRp || a.name.localeCompare(b.name));
  rows.forEach((row, i) => (row.rank = i + 1));

  return { asOf: input.asOf, rows, awards, closedSeasons: seasons };
}

/** name -> total RP; the pre-submission snapshot Giant Slayer compares against */
export function standingsSnapshot(input: StandingsInput, config: LeagueConfig): StandingsSnapshot {
  const snapshot: StandingsSnapshot = {};
  for (const row of buildStandings(input, config).rows) snapshot[row.name] = row.totalRp;
  return snapshot;
}

// --- REPAIR ---

/**
 * Recomputes every player's derived fields from history alone.
 * Handicap is the newHandicap of the player's latest record, or the
 * starting handicap when they have none.
 */
export function rebuildPlayerAggregates(players: Player[], rounds: MatchRecord[]): PlayerAggregates[] {
  const ordered = [...rounds].sort((a, b) => a.date.localeCompare(b.date) || a.createdAt.localeCompare(b.createdAt));
  return players.map((p) => {
    const mine = ordered.filter((r) => r.playerName === p.name);
    const last = mine[mine.length - 1];
    return {
      name: p.name,
      handicap: last ? last.newHandicap : p.startingHandicap,
      roundsPlayed: mine.length,
      totalRp: roundRp(mine.reduce((sum, r) => sum + r.rpEarned, 0)),
    };
  });
}
