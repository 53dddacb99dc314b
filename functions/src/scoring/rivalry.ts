/**
 * Rivalry formats
 * 1v1 duels (stroke play, handicap-scaled stakes) and 2v2 alliances (holes won, fixed stakes)
 */

import type { LeagueConfig } from "../constants.js";
import type { MatchOutcome } from "../types.js";
import { formatRp } from "./roundScoring.js";

// --- DUEL ---

export interface DuelSide {
  name: string;
  strokes: number;
  handicap: number;
}

export type DuelWinner = "p1" | "p2" | "tie";

export type DuelReason = "Lower Strokes" | "Tie-Breaker (Underdog)" | "Absolute Tie";

export interface DuelPlayerResult {
  name: string;
  rp: number;
  outcome: MatchOutcome;
  notes: string;
}

export interface DuelResult {
  winner: DuelWinner;
  reason: DuelReason;
  stakes: number;
  /** True when the winner carried the higher handicap into the match */
  upset: boolean;
  players: [DuelPlayerResult, DuelPlayerResult];
}

function duelNote(rp: number, outcome: MatchOutcome): string {
  if (outcome === "Tie") return "Duel Tie";
  return outcome === "Win" ? `Duel Win (+${formatRp(rp)})` : `Duel Loss (${formatRp(rp)})`;
}

/**
 * Lower strokes wins. Level on strokes, the higher handicap (the underdog)
 * takes it; level on both is an absolute tie worth nothing.
 * Stakes are the upset stake when the underdog wins, otherwise the favorite stake.
 */
export function resolveDuel(p1: DuelSide, p2: DuelSide, config: LeagueConfig): DuelResult {
  let winner: DuelWinner;
  let reason: DuelReason;

  if (p1.strokes !== p2.strokes) {
    winner = p1.strokes < p2.strokes ? "p1" : "p2";
    reason = "Lower Strokes";
  } else if (p1.handicap !== p2.handicap) {
    winner = p1.handicap > p2.handicap ? "p1" : "p2";
    reason = "Tie-Breaker (Underdog)";
  } else {
    winner = "tie";
    reason = "Absolute Tie";
  }

  const upset =
    (winner === "p1" && p1.handicap > p2.handicap) || (winner === "p2" && p2.handicap > p1.handicap);
  const stakes =
    winner === "tie" ? 0 : upset ? config.rivalry.duelUpsetStake : config.rivalry.duelFavoriteStake;

  const sideResult = (side: DuelSide, me: "p1" | "p2"): DuelPlayerResult => {
    const outcome: MatchOutcome = winner === "tie" ? "Tie" : winner === me ? "Win" : "Loss";
    const rp = outcome === "Win" ? stakes : outcome === "Loss" ? -stakes : 0;
    return { name: side.name, rp, outcome, notes: duelNote(rp, outcome) };
  };

  return {
    winner,
    reason,
    stakes,
    upset,
    players: [sideResult(p1, "p1"), sideResult(p2, "p2")],
  };
}

// --- ALLIANCE ---

export interface AllianceTeam {
  players: [string, string];
  holesWon: number;
}

export type AllianceWinner = "teamA" | "teamB" | "tie";

export interface AlliancePlayerResult {
  name: string;
  team: "teamA" | "teamB";
  rp: number;
  outcome: MatchOutcome;
  debut: boolean;
  holesWon: number;
  notes: string;
}

export interface AllianceResult {
  winner: AllianceWinner;
  players: AlliancePlayerResult[];
}

/**
 * More holes won takes the match; equal holes is a tie.
 * `debutants` are players with no earlier Alliance record: each collects the
 * debut bonus once, whatever the result.
 */
export function resolveAlliance(
  teamA: AllianceTeam,
  teamB: AllianceTeam,
  debutants: ReadonlySet<string>,
  config: LeagueConfig
): AllianceResult {
  const winner: AllianceWinner =
    teamA.holesWon > teamB.holesWon ? "teamA" : teamB.holesWon > teamA.holesWon ? "teamB" : "tie";
  const stake = config.rivalry.allianceStake;
  const debutBonus = config.rivalry.duoDebutBonus;

  const forTeam = (team: AllianceTeam, side: "teamA" | "teamB"): AlliancePlayerResult[] =>
    team.players.map((name) => {
      const outcome: MatchOutcome = winner === "tie" ? "Tie" : winner === side ? "Win" : "Loss";
      const matchRp = outcome === "Win" ? stake : outcome === "Loss" ? -stake : 0;
      const debut = debutants.has(name);

      let notes =
        outcome === "Tie"
          ? "Alliance Tie"
          : outcome === "Win"
            ? `Alliance Win (+${formatRp(matchRp)})`
            : `Alliance Loss (${formatRp(matchRp)})`;
      if (debut) notes += `, Duo Debut (+${formatRp(debutBonus)})`;

      return {
        name,
        team: side,
        rp: matchRp + (debut ? debutBonus : 0),
        outcome,
        debut,
        holesWon: team.holesWon,
        notes,
      };
    });

  return { winner, players: [...forTeam(teamA, "teamA"), ...forTeam(teamB, "teamB")] };
}
