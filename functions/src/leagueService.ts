/**
 * League service
 * Validates a payload, reads the full history, runs the pure engine, then
 * commits the whole submission through the store in one call.
 */

import * as logger from "firebase-functions/logger";

import { DEFAULT_LEAGUE_CONFIG, type LeagueConfig } from "./constants.js";
import { LeagueError } from "./errors.js";
import { computeAwards, type AwardsSnapshot } from "./awards/awardEngine.js";
import { groupRounds } from "./awards/headToHead.js";
import { calculateGroupBonuses, type GroupResult } from "./scoring/groupBonuses.js";
import { round1dp } from "./scoring/roundScoring.js";
import { resolveAlliance, resolveDuel, type AllianceResult, type DuelResult } from "./scoring/rivalry.js";
import { getSeason, parseIsoDate, seasonKey } from "./seasons.js";
import { buildStandings, rebuildPlayerAggregates, standingsSnapshot, type Standings } from "./standings.js";
import type { LeagueStore } from "./store/leagueStore.js";
import type {
  DeleteGroupResult,
  MatchRecord,
  MatchRecordDraft,
  MatchType,
  Player,
  PlayerAggregates,
  PlayerUpdate,
  SeasonName,
} from "./types.js";
import {
  AllianceSchema,
  DuelSchema,
  RegisterPlayerSchema,
  StandardRoundSchema,
  parsePayload,
} from "./validation.js";

export type LeagueLogger = Pick<typeof logger, "info" | "warn" | "error">;

export interface LeagueServiceOptions {
  config?: LeagueConfig;
  logger?: LeagueLogger;
  now?: () => Date;
}

export interface StandardSubmission {
  groupId: string;
  season: SeasonName;
  results: GroupResult[];
}

export interface DuelSubmission {
  groupId: string;
  season: SeasonName;
  result: DuelResult;
}

export interface AllianceSubmission {
  groupId: string;
  season: SeasonName;
  result: AllianceResult;
}

export interface MatchGroupSummary {
  key: string;
  matchGroupId: string | null;
  date: string;
  course: string;
  matchType: MatchType;
  /** Legacy rows without a group id cannot be deleted as a unit */
  deletable: boolean;
  rows: MatchRecord[];
}

export class LeagueService {
  private readonly config: LeagueConfig;
  private readonly log: LeagueLogger;
  private readonly now: () => Date;

  constructor(private readonly store: LeagueStore, options: LeagueServiceOptions = {}) {
    this.config = options.config ?? DEFAULT_LEAGUE_CONFIG;
    this.log = options.logger ?? logger;
    this.now = options.now ?? (() => new Date());
  }

  private today(): string {
    return this.now().toISOString().slice(0, 10);
  }

  private async snapshot(): Promise<{ players: Player[]; rounds: MatchRecord[] }> {
    const [players, rounds] = await Promise.all([this.store.loadAllPlayers(), this.store.loadAllRounds()]);
    return { players, rounds };
  }

  private requirePlayers(players: Player[], names: string[]): Map<string, Player> {
    const byName = new Map(players.map((p) => [p.name, p]));
    const missing = names.filter((n) => !byName.has(n));
    if (missing.length > 0) {
      throw new LeagueError("not-found", `Unknown player${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`);
    }
    return byName;
  }

  // ==========================================================================
  // PLAYERS
  // ==========================================================================

  async registerPlayer(payload: unknown): Promise<Player> {
    const input = parsePayload(RegisterPlayerSchema, payload);
    const hcp = round1dp(input.handicap);
    const player: Player = { name: input.name, handicap: hcp, startingHandicap: hcp, roundsPlayed: 0, totalRp: 0 };
    await this.store.addPlayer(player);
    this.log.info("Player registered", { name: player.name, handicap: hcp });
    return player;
  }

  async removePlayer(name: string): Promise<{ name: string; deletedRows: number }> {
    const deletedRows = await this.store.deletePlayer(name);
    this.log.info("Player removed", { name, deletedRows });
    return { name, deletedRows };
  }

  // ==========================================================================
  // SUBMISSIONS
  // ==========================================================================

  async submitStandardRound(payload: unknown): Promise<StandardSubmission> {
    const input = parsePayload(StandardRoundSchema, payload);
    const { players, rounds } = await this.snapshot();
    const byName = this.requirePlayers(players, input.players.map((p) => p.name));

    const season = getSeason(input.date);
    const key = seasonKey(input.date);
    const cap = this.config.scoring.participationSeasonCap;
    const usedParticipation = (name: string) =>
      rounds
        .filter((r) => r.playerName === name && parseIsoDate(r.date) !== null && seasonKey(r.date) === key)
        .reduce((sum, r) => sum + r.participationRp, 0);

    // Giant Slayer compares against the standings as they stood before this round
    const prior = standingsSnapshot({ players, rounds, asOf: this.today() }, this.config);

    const results = calculateGroupBonuses(
      input.players.map((p) => ({
        name: p.name,
        stableford: p.stableford,
        handicap: byName.get(p.name)?.handicap ?? 0,
        cleanSheet: p.cleanSheet,
        holeInOne: p.holeInOne,
        roadWarrior: p.roadWarrior,
        participationRemaining: cap === null ? undefined : cap - usedParticipation(p.name),
      })),
      prior,
      input.holesPlayed,
      this.config
    );

    const createdAt = this.now().toISOString();
    const drafts: MatchRecordDraft[] = [];
    const updates: PlayerUpdate[] = [];
    input.players.forEach((p, i) => {
      const res = results[i];
      const previousHandicap = byName.get(p.name)?.handicap ?? 0;
      drafts.push({
        playerName: p.name,
        date: input.date,
        season,
        course: input.course,
        matchType: "Standard",
        holesPlayed: input.holesPlayed,
        grossScore: p.gross,
        stablefordScore: p.stableford,
        rpEarned: res.totalRp,
        participationRp: res.participationRp,
        previousHandicap,
        newHandicap: res.newHandicap,
        notes: res.notes,
        cleanSheet: p.cleanSheet,
        holeInOne: p.holeInOne,
        isRivalry: false,
        outcome: res.isWinnerOfDay ? "Win" : null,
        holesWon: null,
        createdAt,
      });
      updates.push({ name: p.name, handicap: res.newHandicap, rpDelta: res.totalRp, roundsDelta: 1 });
    });

    const groupId = await this.store.commitRoundGroup(drafts, updates);
    this.log.info("Standard round saved", { groupId, course: input.course, players: drafts.length });
    return { groupId, season, results };
  }

  async submitDuel(payload: unknown): Promise<DuelSubmission> {
    const input = parsePayload(DuelSchema, payload);
    const { players } = await this.snapshot();
    const byName = this.requirePlayers(players, [input.playerOne.name, input.playerTwo.name]);
    const hcp = (name: string) => byName.get(name)?.handicap ?? 0;

    const result = resolveDuel(
      { name: input.playerOne.name, strokes: input.playerOne.strokes, handicap: hcp(input.playerOne.name) },
      { name: input.playerTwo.name, strokes: input.playerTwo.strokes, handicap: hcp(input.playerTwo.name) },
      this.config
    );

    const season = getSeason(input.date);
    const createdAt = this.now().toISOString();
    const strokes = [input.playerOne.strokes, input.playerTwo.strokes];
    const drafts: MatchRecordDraft[] = result.players.map((side, i) => ({
      playerName: side.name,
      date: input.date,
      season,
      course: `${input.course} (Duel)`,
      matchType: "Duel",
      holesPlayed: 18,
      grossScore: strokes[i],
      stablefordScore: 0,
      rpEarned: side.rp,
      participationRp: 0,
      previousHandicap: hcp(side.name),
      newHandicap: hcp(side.name),
      notes: side.notes,
      cleanSheet: false,
      holeInOne: false,
      isRivalry: true,
      outcome: side.outcome,
      holesWon: null,
      createdAt,
    }));
    const updates = result.players.map((side) => ({
      name: side.name,
      handicap: hcp(side.name),
      rpDelta: side.rp,
      roundsDelta: 1,
    }));

    const groupId = await this.store.commitRoundGroup(drafts, updates);
    this.log.info("Duel saved", { groupId, winner: result.winner, reason: result.reason, stakes: result.stakes });
    return { groupId, season, result };
  }

  async submitAlliance(payload: unknown): Promise<AllianceSubmission> {
    const input = parsePayload(AllianceSchema, payload);
    const { players, rounds } = await this.snapshot();
    const names = [...input.teamA, ...input.teamB];
    const byName = this.requirePlayers(players, names);
    const hcp = (name: string) => byName.get(name)?.handicap ?? 0;

    const veterans = new Set(rounds.filter((r) => r.matchType === "Alliance").map((r) => r.playerName));
    const debutants = new Set(names.filter((n) => !veterans.has(n)));

    const result = resolveAlliance(
      { players: [input.teamA[0], input.teamA[1]], holesWon: input.holesWonA },
      { players: [input.teamB[0], input.teamB[1]], holesWon: input.holesWonB },
      debutants,
      this.config
    );

    const season = getSeason(input.date);
    const createdAt = this.now().toISOString();
    const drafts: MatchRecordDraft[] = result.players.map((side) => ({
      playerName: side.name,
      date: input.date,
      season,
      course: `${input.course} (Alliance)`,
      matchType: "Alliance",
      holesPlayed: 18,
      grossScore: 0,
      stablefordScore: 0,
      rpEarned: side.rp,
      participationRp: 0,
      previousHandicap: hcp(side.name),
      newHandicap: hcp(side.name),
      notes: side.notes,
      cleanSheet: false,
      holeInOne: false,
      isRivalry: true,
      outcome: side.outcome,
      holesWon: side.holesWon,
      createdAt,
    }));
    const updates = result.players.map((side) => ({
      name: side.name,
      handicap: hcp(side.name),
      rpDelta: side.rp,
      roundsDelta: 1,
    }));

    const groupId = await this.store.commitRoundGroup(drafts, updates);
    this.log.info("Alliance saved", { groupId, winner: result.winner, debutants: [...debutants] });
    return { groupId, season, result };
  }

  async deleteMatchGroup(groupId: string): Promise<DeleteGroupResult> {
    const result = await this.store.deleteRoundGroup(groupId);
    for (const name of result.skipped) {
      this.log.warn("Skipped reversal for missing player", { groupId, player: name });
    }
    this.log.info("Match group deleted", { groupId, rows: result.deletedRows, reversed: result.reversed.length });
    return result;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  async getStandings(asOf?: string): Promise<Standings> {
    const { players, rounds } = await this.snapshot();
    return buildStandings({ players, rounds, asOf: asOf ?? this.today() }, this.config);
  }

  async getAwards(asOf?: string): Promise<AwardsSnapshot> {
    const { players, rounds } = await this.snapshot();
    return computeAwards({ rounds, players, asOf: asOf ?? this.today() }, this.config);
  }

  /** Submissions newest first, each with all of its rows */
  async getMatchHistory(): Promise<MatchGroupSummary[]> {
    const rounds = await this.store.loadAllRounds();
    const groups = [...groupRounds(rounds).entries()].map(([key, rows]) => {
      const first = rows[0];
      return {
        key,
        matchGroupId: first.matchGroupId,
        date: first.date,
        course: first.course,
        matchType: first.matchType,
        deletable: first.matchGroupId !== null,
        rows,
      };
    });
    return groups.sort(
      (a, b) =>
        b.date.localeCompare(a.date) ||
        b.rows[0].createdAt.localeCompare(a.rows[0].createdAt) ||
        a.key.localeCompare(b.key)
    );
  }

  /** Full recompute of every player's totals from history */
  async rebuildAggregates(): Promise<PlayerAggregates[]> {
    const { players, rounds } = await this.snapshot();
    const aggregates = rebuildPlayerAggregates(players, rounds);
    await this.store.replacePlayerAggregates(aggregates);
    this.log.info("Player aggregates rebuilt", { players: aggregates.length, rounds: rounds.length });
    return aggregates;
  }
}
