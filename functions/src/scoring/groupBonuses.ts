/**
 * Group round bonuses
 * Winner-of-day pot, giant slayer and per-player extras for one simultaneous cohort
 */

import type { LeagueConfig } from "../constants.js";
import type { HolesPlayed, StandingsSnapshot } from "../types.js";
import { newHandicap, roundRp, scoreRound, trailEntry } from "./roundScoring.js";

export interface GroupEntry {
  name: string;
  stableford: number;
  handicap: number;
  cleanSheet?: boolean;
  holeInOne?: boolean;
  roadWarrior?: boolean;
  /** Participation RP left under the season cap; omit when uncapped */
  participationRemaining?: number;
}

export interface GroupResult {
  name: string;
  totalRp: number;
  notes: string;
  newHandicap: number;
  participationRp: number;
  isWinnerOfDay: boolean;
  winnerOfDayShare: number;
  giantSlayerPoints: number;
}

/** Pot for a cohort size, before the 9-hole factor */
export function potForCohort(cohortSize: number, config: LeagueConfig): number {
  const tiers = [...config.group.potTiers].sort((a, b) => b.minPlayers - a.minPlayers);
  const tier = tiers.find((t) => cohortSize >= t.minPlayers);
  return tier ? tier.pot : 0;
}

/**
 * Each winner's share of the winner-of-day pot.
 * "exact" keeps the fraction to hundredths, "ceil" rounds every share up to a whole point.
 */
export function winnerShare(pot: number, winners: number, config: LeagueConfig): number {
  if (winners <= 0 || pot <= 0) return 0;
  const share = pot / winners;
  return config.group.potSplit === "ceil" ? Math.ceil(share) : roundRp(share);
}

/**
 * Computes RP, notes and new handicap for every player of one round.
 * `priorStandings` must be the snapshot from BEFORE this submission; it is
 * only read, never updated, so the result does not depend on player order.
 */
export function calculateGroupBonuses(
  entries: GroupEntry[],
  priorStandings: StandingsSnapshot,
  holesPlayed: HolesPlayed,
  config: LeagueConfig
): GroupResult[] {
  if (entries.length === 0) return [];

  const highest = Math.max(...entries.map((e) => e.stableford));
  const winners = entries.filter((e) => e.stableford === highest);
  const isTie = winners.length > 1;

  const factor = holesPlayed === 9 ? config.group.nineHolePotFactor : 1;
  const pot = potForCohort(entries.length, config) * factor;
  const share = entries.length >= 2 ? winnerShare(pot, winners.length, config) : 0;

  const priorRp = (name: string) => priorStandings[name] ?? 0;

  return entries.map((entry) => {
    let cohortBonus = 0;
    const cohortTrail: string[] = [];

    const isWinnerOfDay = entries.length >= 2 && entry.stableford === highest;
    if (isWinnerOfDay && share > 0) {
      cohortBonus += share;
      cohortTrail.push(trailEntry(isTie ? "Winner of Day (Tie)" : "Winner of Day", share));
    }

    // Giant Slayer: +1 per opponent beaten who sat higher in the standings
    const myRp = priorRp(entry.name);
    const beatenGiants = entries.filter(
      (opp) => opp.name !== entry.name && entry.stableford > opp.stableford && priorRp(opp.name) > myRp
    ).length;
    const giantSlayerPoints = beatenGiants * config.group.giantSlayerBonus;
    if (giantSlayerPoints > 0) {
      cohortBonus += giantSlayerPoints;
      cohortTrail.push(trailEntry("Giant Slayer", giantSlayerPoints));
    }

    const score = scoreRound(
      {
        stableford: entry.stableford,
        holesPlayed,
        cleanSheet: entry.cleanSheet,
        holeInOne: entry.holeInOne,
        roadWarrior: entry.roadWarrior,
        participationRemaining: entry.participationRemaining,
        extraBonus: cohortBonus,
        extraTrail: cohortTrail,
      },
      config
    );

    return {
      name: entry.name,
      totalRp: score.baseRp,
      notes: score.trail,
      newHandicap: holesPlayed === 18 ? newHandicap(entry.handicap, entry.stableford, config) : entry.handicap,
      participationRp: score.participation,
      isWinnerOfDay,
      winnerOfDayShare: isWinnerOfDay ? share : 0,
      giantSlayerPoints,
    };
  });
}
