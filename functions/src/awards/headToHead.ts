/**
 * Head-to-head tie resolution
 * Breaks a tie on any award metric by counting who came out on top in the
 * rounds the tied players shared.
 */

import type { MatchRecord } from "../types.js";

export type TieResolution =
  | { kind: "none"; reason: "No Candidates" }
  | { kind: "winner"; winner: string; reason: string }
  | { kind: "tied"; players: string[]; reason: string };

export const NEVER_PLAYED_TOGETHER = "Tie Unresolved (Never played together)";
export const EQUAL_H2H_RECORD = "Tie Unresolved (Equal H2H record)";

type H2HRow = Pick<MatchRecord, "playerName" | "stablefordScore" | "matchGroupId" | "date" | "course">;

/** Round identity: the submission group, or date + course for legacy rows */
export function roundKey(row: Pick<MatchRecord, "matchGroupId" | "date" | "course">): string {
  return row.matchGroupId ?? `${row.date}${row.course}`;
}

export function groupRounds<T extends Pick<MatchRecord, "matchGroupId" | "date" | "course">>(rows: T[]): Map<string, T[]> {
  const rounds = new Map<string, T[]>();
  for (const row of rows) {
    const key = roundKey(row);
    const list = rounds.get(key);
    if (list) list.push(row);
    else rounds.set(key, [row]);
  }
  return rounds;
}

/**
 * Every submission counts, rivalry groups included. Duel and Alliance rows
 * carry a Stableford score of 0, so each tied player in one is credited a win.
 * Pass the same full history on every call so the result is deterministic.
 */
export function resolveTie(candidates: string[], history: H2HRow[]): TieResolution {
  const tied = [...new Set(candidates)];
  if (tied.length === 0) return { kind: "none", reason: "No Candidates" };
  if (tied.length === 1) return { kind: "winner", winner: tied[0], reason: "Clear Winner" };

  const wins = new Map<string, number>(tied.map((name) => [name, 0]));
  let playedTogether = false;

  const candidateRows = history.filter((r) => wins.has(r.playerName));
  for (const rows of groupRounds(candidateRows).values()) {
    const present = new Set(rows.map((r) => r.playerName));
    if (present.size < 2) continue;
    playedTogether = true;

    const best = Math.max(...rows.map((r) => r.stablefordScore));
    const roundWinners = new Set(rows.filter((r) => r.stablefordScore === best).map((r) => r.playerName));
    for (const name of roundWinners) wins.set(name, (wins.get(name) ?? 0) + 1);
  }

  if (!playedTogether) return { kind: "tied", players: tied, reason: NEVER_PLAYED_TOGETHER };

  const maxWins = Math.max(...wins.values());
  const leaders = tied.filter((name) => wins.get(name) === maxWins);
  if (leaders.length === 1) {
    return { kind: "winner", winner: leaders[0], reason: `Won H2H (${maxWins} wins)` };
  }
  return { kind: "tied", players: leaders, reason: EQUAL_H2H_RECORD };
}

/** Names holding the result: one winner, every tied name, or nobody */
export function holdersOf(resolution: TieResolution): string[] {
  if (resolution.kind === "winner") return [resolution.winner];
  if (resolution.kind === "tied") return resolution.players;
  return [];
}
