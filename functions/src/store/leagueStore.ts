/**
 * Persistence contract for the league.
 * The engine never talks to a database directly: the service reads the full
 * history through this interface, computes, then commits one group atomically.
 */

import type {
  DeleteGroupResult,
  MatchRecord,
  MatchRecordDraft,
  Player,
  PlayerAggregates,
  PlayerUpdate,
} from "../types.js";

export interface LeagueStore {
  loadAllRounds(): Promise<MatchRecord[]>;
  loadAllPlayers(): Promise<Player[]>;

  /** Throws LeagueError("already-exists") when the name is taken */
  addPlayer(player: Player): Promise<void>;
  /** Removes the player and every match record they appear in. Returns rows removed. */
  deletePlayer(name: string): Promise<number>;

  /**
   * Appends every record under one new group id and applies every player
   * update; all of it lands or none of it does.
   */
  commitRoundGroup(records: MatchRecordDraft[], updates: PlayerUpdate[]): Promise<string>;

  /**
   * Compensating delete: reverses each row's RP and round from its player,
   * restores the handicap the group replaced when nothing has moved it since,
   * then removes the rows. Rows whose player is gone are skipped.
   */
  deleteRoundGroup(groupId: string): Promise<DeleteGroupResult>;

  /** Overwrites derived player fields with values rebuilt from history */
  replacePlayerAggregates(aggregates: PlayerAggregates[]): Promise<void>;
}
