/**
 * In-process LeagueStore.
 * Used by the tests and by local tooling; each call works on copies so a
 * failed commit leaves nothing behind.
 */

import { randomUUID } from "node:crypto";

import { LeagueError } from "../errors.js";
import { roundRp } from "../scoring/roundScoring.js";
import type {
  DeleteGroupResult,
  MatchRecord,
  MatchRecordDraft,
  Player,
  PlayerAggregates,
  PlayerUpdate,
} from "../types.js";
import type { LeagueStore } from "./leagueStore.js";

export class MemoryLeagueStore implements LeagueStore {
  private players = new Map<string, Player>();
  private rounds: MatchRecord[] = [];
  private readonly nextId: () => string;

  constructor(seed: { players?: Player[]; rounds?: MatchRecord[] } = {}, nextId: () => string = randomUUID) {
    for (const p of seed.players ?? []) this.players.set(p.name, { ...p });
    this.rounds = (seed.rounds ?? []).map((r) => ({ ...r }));
    this.nextId = nextId;
  }

  async loadAllRounds(): Promise<MatchRecord[]> {
    return this.rounds.map((r) => ({ ...r }));
  }

  async loadAllPlayers(): Promise<Player[]> {
    return [...this.players.values()].map((p) => ({ ...p }));
  }

  async addPlayer(player: Player): Promise<void> {
    if (this.players.has(player.name)) {
      throw new LeagueError("already-exists", `Player "${player.name}" already exists`);
    }
    this.players.set(player.name, { ...player });
  }

  async deletePlayer(name: string): Promise<number> {
    if (!this.players.delete(name)) {
      throw new LeagueError("not-found", `Player "${name}" not found`);
    }
    const before = this.rounds.length;
    this.rounds = this.rounds.filter((r) => r.playerName !== name);
    return before - this.rounds.length;
  }

  async commitRoundGroup(records: MatchRecordDraft[], updates: PlayerUpdate[]): Promise<string> {
    const staged = new Map(this.players);
    for (const u of updates) {
      const p = staged.get(u.name);
      if (!p) throw new LeagueError("not-found", `Player "${u.name}" not found`);
      staged.set(u.name, {
        ...p,
        handicap: u.handicap,
        totalRp: roundRp(p.totalRp + u.rpDelta),
        roundsPlayed: p.roundsPlayed + u.roundsDelta,
      });
    }

    const groupId = this.nextId();
    this.players = staged;
    this.rounds.push(...records.map((r) => ({ ...r, matchGroupId: groupId })));
    return groupId;
  }

  async deleteRoundGroup(groupId: string): Promise<DeleteGroupResult> {
    const rows = this.rounds.filter((r) => r.matchGroupId === groupId);
    if (rows.length === 0) throw new LeagueError("not-found", `Match group "${groupId}" not found`);

    const reversed: string[] = [];
    const skipped: string[] = [];
    for (const row of rows) {
      const p = this.players.get(row.playerName);
      if (!p) {
        skipped.push(row.playerName);
        continue;
      }
      this.players.set(p.name, {
        ...p,
        totalRp: roundRp(p.totalRp - row.rpEarned),
        roundsPlayed: p.roundsPlayed - 1,
        handicap: p.handicap === row.newHandicap ? row.previousHandicap : p.handicap,
      });
      reversed.push(p.name);
    }

    this.rounds = this.rounds.filter((r) => r.matchGroupId !== groupId);
    return { groupId, deletedRows: rows.length, reversed, skipped };
  }

  async replacePlayerAggregates(aggregates: PlayerAggregates[]): Promise<void> {
    for (const a of aggregates) {
      const p = this.players.get(a.name);
      if (!p) continue;
      this.players.set(a.name, { ...p, handicap: a.handicap, roundsPlayed: a.roundsPlayed, totalRp: a.totalRp });
    }
  }
}
