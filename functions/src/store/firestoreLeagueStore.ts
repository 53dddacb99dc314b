/**
 * Firestore-backed LeagueStore
 *
 * Collections:
 * - players/{name}        - one doc per player, id = player name
 * - matchRecords/{autoId} - one doc per player per participation event
 *
 * Submissions and group deletes run inside a transaction so the rows and the
 * player aggregates move together.
 */

import { FieldValue, type DocumentData, type Firestore } from "firebase-admin/firestore";
import { z } from "zod";

import { MATCH_RECORDS_COLLECTION, MAX_BATCH_WRITES, PLAYERS_COLLECTION } from "../constants.js";
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
import { describeZodError } from "../validation.js";
import type { LeagueStore } from "./leagueStore.js";

// ============================================================================
// DOCUMENT SCHEMAS
// Older docs predate some fields; those fall back to neutral values.
// ============================================================================

const PlayerDocSchema = z
  .object({
    name: z.string(),
    handicap: z.number(),
    startingHandicap: z.number().optional(),
    roundsPlayed: z.number().int().default(0),
    totalRp: z.number().default(0),
  })
  .transform((p): Player => ({ ...p, startingHandicap: p.startingHandicap ?? p.handicap }));

const MatchRecordDocSchema = z
  .object({
    playerName: z.string(),
    date: z.string(),
    season: z.enum(["Season 1", "Season 2", "Kings Cup", "Season 3", "Season 4", "Finals"]),
    course: z.string(),
    matchType: z.enum(["Standard", "Duel", "Alliance"]),
    holesPlayed: z.union([z.literal(18), z.literal(9)]).default(18),
    grossScore: z.number().default(0),
    stablefordScore: z.number().default(0),
    rpEarned: z.number(),
    participationRp: z.number().default(0),
    previousHandicap: z.number().optional(),
    newHandicap: z.number(),
    notes: z.string().default(""),
    cleanSheet: z.boolean().default(false),
    holeInOne: z.boolean().default(false),
    isRivalry: z.boolean().default(false),
    outcome: z.enum(["Win", "Loss", "Tie"]).nullable().default(null),
    holesWon: z.number().nullable().default(null),
    matchGroupId: z.string().nullable().default(null),
    createdAt: z.string().default(""),
  })
  .transform((r): MatchRecord => ({ ...r, previousHandicap: r.previousHandicap ?? r.newHandicap }));

function parseDoc<S extends z.ZodTypeAny>(schema: S, id: string, data: DocumentData | undefined): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new LeagueError("failed-precondition", `Malformed document ${id}: ${describeZodError(result.error)}`);
  }
  return result.data;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export class FirestoreLeagueStore implements LeagueStore {
  constructor(private readonly db: Firestore) {}

  private get players() {
    return this.db.collection(PLAYERS_COLLECTION);
  }

  private get records() {
    return this.db.collection(MATCH_RECORDS_COLLECTION);
  }

  async loadAllRounds(): Promise<MatchRecord[]> {
    const snap = await this.records.get();
    return snap.docs.map((d) => parseDoc(MatchRecordDocSchema, d.id, d.data()));
  }

  async loadAllPlayers(): Promise<Player[]> {
    const snap = await this.players.get();
    return snap.docs.map((d) => parseDoc(PlayerDocSchema, d.id, { name: d.id, ...d.data() }));
  }

  async addPlayer(player: Player): Promise<void> {
    const ref = this.players.doc(player.name);
    await this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (snap.exists) throw new LeagueError("already-exists", `Player "${player.name}" already exists`);
      tx.set(ref, { ...player });
    });
  }

  async deletePlayer(name: string): Promise<number> {
    const ref = this.players.doc(name);
    const snap = await ref.get();
    if (!snap.exists) throw new LeagueError("not-found", `Player "${name}" not found`);

    const rows = await this.records.where("playerName", "==", name).get();
    for (const docs of chunk(rows.docs, MAX_BATCH_WRITES)) {
      const batch = this.db.batch();
      docs.forEach((d) => batch.delete(d.ref));
      await batch.commit();
    }
    await ref.delete();
    return rows.size;
  }

  async commitRoundGroup(records: MatchRecordDraft[], updates: PlayerUpdate[]): Promise<string> {
    const groupId = this.records.doc().id;
    const refs = updates.map((u) => this.players.doc(u.name));

    await this.db.runTransaction(async (tx) => {
      const snaps = refs.length > 0 ? await tx.getAll(...refs) : [];
      const missing = snaps.filter((s) => !s.exists).map((s) => s.id);
      if (missing.length > 0) throw new LeagueError("not-found", `Unknown player: ${missing.join(", ")}`);
      const current = snaps.map((s) => parseDoc(PlayerDocSchema, s.id, { name: s.id, ...s.data() }));

      for (const record of records) {
        tx.set(this.records.doc(), { ...record, matchGroupId: groupId });
      }
      // totalRp is written from this read, rounded, never incremented
      updates.forEach((u, i) => {
        tx.update(refs[i], {
          handicap: u.handicap,
          totalRp: roundRp(current[i].totalRp + u.rpDelta),
          roundsPlayed: FieldValue.increment(u.roundsDelta),
        });
      });
    });

    return groupId;
  }

  async deleteRoundGroup(groupId: string): Promise<DeleteGroupResult> {
    const query = this.records.where("matchGroupId", "==", groupId);

    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(query);
      if (snap.empty) throw new LeagueError("not-found", `Match group "${groupId}" not found`);
      const rows = snap.docs.map((d) => parseDoc(MatchRecordDocSchema, d.id, d.data()));

      const names = [...new Set(rows.map((r) => r.playerName))];
      const playerSnaps = await tx.getAll(...names.map((n) => this.players.doc(n)));
      const current = new Map<string, Player>();
      for (const s of playerSnaps) {
        if (s.exists) current.set(s.id, parseDoc(PlayerDocSchema, s.id, { name: s.id, ...s.data() }));
      }

      // All reads done; compensating writes follow
      const reversed: string[] = [];
      const skipped: string[] = [];
      const deltas = new Map<string, { totalRp: number; rounds: number; handicap: number }>();
      for (const row of rows) {
        const player = current.get(row.playerName);
        if (!player) {
          skipped.push(row.playerName);
          continue;
        }
        const d = deltas.get(player.name) ?? { totalRp: player.totalRp, rounds: 0, handicap: player.handicap };
        d.totalRp = roundRp(d.totalRp - row.rpEarned);
        d.rounds += 1;
        if (d.handicap === row.newHandicap) d.handicap = row.previousHandicap;
        deltas.set(player.name, d);
        reversed.push(player.name);
      }

      for (const [name, d] of deltas) {
        tx.update(this.players.doc(name), {
          handicap: d.handicap,
          totalRp: d.totalRp,
          roundsPlayed: FieldValue.increment(-d.rounds),
        });
      }
      snap.docs.forEach((d) => tx.delete(d.ref));

      return { groupId, deletedRows: rows.length, reversed, skipped };
    });
  }

  async replacePlayerAggregates(aggregates: PlayerAggregates[]): Promise<void> {
    for (const group of chunk(aggregates, MAX_BATCH_WRITES)) {
      const batch = this.db.batch();
      for (const a of group) {
        batch.set(
          this.players.doc(a.name),
          { handicap: a.handicap, roundsPlayed: a.roundsPlayed, totalRp: a.totalRp },
          { merge: true }
        );
      }
      await batch.commit();
    }
  }
}
