/**
 * Unit tests for awardEngine.ts
 */

import { describe, it, expect } from "vitest";
import { computeAwards, computeConqueror, computeRock, computeRocket, computeSniper } from "./awardEngine.js";
import { DEFAULT_LEAGUE_CONFIG, type LeagueConfig } from "../constants.js";
import type { MatchRecord, Player } from "../types.js";

const config = DEFAULT_LEAGUE_CONFIG;

// --- HELPERS ---

function row(playerName: string, group: string, overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    playerName,
    date: "2026-05-02",
    season: "Season 2",
    course: "Oak Hill",
    matchType: "Standard",
    holesPlayed: 18,
    grossScore: 90,
    stablefordScore: 30,
    rpEarned: 0,
    participationRp: 2,
    previousHandicap: 18,
    newHandicap: 18,
    notes: "",
    cleanSheet: false,
    holeInOne: false,
    isRivalry: false,
    outcome: null,
    holesWon: null,
    matchGroupId: group,
    createdAt: "2026-05-02T10:00:00.000Z",
    ...overrides,
  };
}

/** One solo Standard round per score, each in its own group */
function soloRounds(name: string, scores: number[], overrides: Partial<MatchRecord> = {}): MatchRecord[] {
  return scores.map((stablefordScore, i) => row(name, `${name}-${i}`, { stablefordScore, ...overrides }));
}

function player(name: string, startingHandicap: number, handicap: number, roundsPlayed: number): Player {
  return { name, startingHandicap, handicap, roundsPlayed, totalRp: 0 };
}

// --- THE ROCK ---

describe("computeRock", () => {
  it("goes to the best average among players with enough 18-hole rounds", () => {
    const rounds = [
      ...soloRounds("Alice", [38, 38, 38, 38, 38]),
      ...soloRounds("Bob", [36, 36, 36, 36, 36]),
      ...soloRounds("Cara", [45, 45, 45, 45]),
    ];
    const result = computeRock(rounds, rounds, config);
    expect(result.holders).toEqual(["Alice"]);
    expect(result.stat).toBe("38.00 Avg");
    expect(result.bonusPaid).toBe(10);
  });

  it("does not count 9-hole rounds", () => {
    const rounds = soloRounds("Alice", [40, 40, 40, 40, 40], { holesPlayed: 9 });
    const result = computeRock(rounds, rounds, config);
    expect(result).toEqual({
      key: "rock",
      title: "The Rock",
      holders: [],
      resolution: null,
      bonusPaid: 0,
      stat: "Min 5 Rnds",
    });
  });

  it("lists every tied holder and pays nothing when the tie cannot be broken", () => {
    const rounds = [...soloRounds("Alice", [38, 38, 38, 38, 38]), ...soloRounds("Bob", [38, 38, 38, 38, 38])];
    const result = computeRock(rounds, rounds, config);
    expect(result.holders).toEqual(["Alice", "Bob"]);
    expect(result.bonusPaid).toBe(0);
    expect(result.resolution?.reason).toBe("Tie Unresolved (Never played together)");
  });
});

// --- THE SNIPER ---

describe("computeSniper", () => {
  it("takes the lowest gross above the floor from 18-hole rounds and duels", () => {
    const rounds = [
      row("Alice", "g1", { grossScore: 72 }),
      row("Bob", "d1", { matchType: "Duel", grossScore: 70, stablefordScore: 0 }),
      row("Cara", "g2", { grossScore: 15 }),
      row("Dev", "g3", { grossScore: 60, holesPlayed: 9 }),
    ];
    const result = computeSniper(rounds, rounds, "2026-05-20", config);
    expect(result.holders).toEqual(["Bob"]);
    expect(result.stat).toBe("70 Strokes");
    expect(result.bonusPaid).toBe(5);
  });

  it("limits itself to the month of asOf in month mode", () => {
    const monthly: LeagueConfig = {
      ...config,
      awards: { ...config.awards, sniper: { ...config.awards.sniper, window: "month" } },
    };
    const rounds = [
      row("Alice", "g1", { grossScore: 72, date: "2026-05-03" }),
      row("Bob", "g2", { grossScore: 70, date: "2026-04-10" }),
    ];
    expect(computeSniper(rounds, rounds, "2026-05-20", monthly).holders).toEqual(["Alice"]);
  });

  it("breaks an equal gross on the shared round", () => {
    const rounds = [
      row("Alice", "g1", { grossScore: 72, stablefordScore: 38 }),
      row("Bob", "g1", { grossScore: 72, stablefordScore: 34 }),
    ];
    const result = computeSniper(rounds, rounds, "2026-05-20", config);
    expect(result.holders).toEqual(["Alice"]);
    expect(result.resolution).toEqual({ kind: "winner", winner: "Alice", reason: "Won H2H (1 wins)" });
    expect(result.bonusPaid).toBe(5);
  });

  it("is vacant without a qualifying round", () => {
    expect(computeSniper([], [], "2026-05-20", config).stat).toBe("No Rounds");
  });
});

// --- THE CONQUEROR ---

describe("computeConqueror", () => {
  it("needs the minimum number of wins", () => {
    const twoWins = [row("Bob", "g1", { outcome: "Win" }), row("Bob", "g2", { outcome: "Win" })];
    expect(computeConqueror(twoWins, twoWins, config).stat).toBe("Min 3 Wins");

    const rounds = [
      ...twoWins,
      row("Alice", "g3", { outcome: "Win" }),
      row("Alice", "d1", { matchType: "Duel", outcome: "Win" }),
      row("Alice", "a1", { matchType: "Alliance", outcome: "Win" }),
      row("Alice", "a2", { matchType: "Alliance", outcome: "Loss" }),
    ];
    const result = computeConqueror(rounds, rounds, config);
    expect(result.holders).toEqual(["Alice"]);
    expect(result.stat).toBe("3 Wins");
  });
});

// --- THE ROCKET ---

describe("computeRocket", () => {
  it("goes to the biggest handicap drop among eligible players", () => {
    const players = [player("Alice", 20, 17.5, 3), player("Bob", 20, 18, 5), player("Cara", 20, 15, 2)];
    const result = computeRocket(players, [], config);
    expect(result.holders).toEqual(["Alice"]);
    expect(result.stat).toBe("-2.5");
    expect(result.bonusPaid).toBe(10);
  });

  it("is vacant when nobody has dropped", () => {
    expect(computeRocket([player("Alice", 20, 21, 4)], [], config).stat).toBe("No Drop");
    expect(computeRocket([player("Alice", 20, 10, 1)], [], config).stat).toBe("Min 3 Rnds");
  });
});

// --- computeAwards ---

describe("computeAwards", () => {
  const players = [player("Alice", 20, 17.5, 5), player("Bob", 18, 18, 5)];
  const rounds = [0, 1, 2, 3, 4].flatMap((i) => [
    row("Alice", `g${i}`, { stablefordScore: 38, grossScore: 80, outcome: "Win" }),
    row("Bob", `g${i}`, { stablefordScore: 34, grossScore: 85 }),
  ]);

  it("pays every award held outright", () => {
    const snapshot = computeAwards({ rounds, players, asOf: "2026-05-20" }, config);
    expect(snapshot.awards.rock?.holders).toEqual(["Alice"]);
    expect(snapshot.awards.sniper?.stat).toBe("80 Strokes");
    expect(snapshot.awards.conqueror?.stat).toBe("5 Wins");
    expect(snapshot.awards.rocket?.stat).toBe("-2.5");
    expect(snapshot.bonuses).toEqual({ Alice: 35, Bob: 0 });
  });

  it("gives the same answer every time", () => {
    const input = { rounds, players, asOf: "2026-05-20" };
    expect(computeAwards(input, config)).toEqual(computeAwards(input, config));
  });

  it("computes only the requested awards", () => {
    const snapshot = computeAwards({ rounds, players, asOf: "2026-05-20", only: ["rock"] }, config);
    expect(Object.keys(snapshot.awards)).toEqual(["rock"]);
    expect(snapshot.bonuses).toEqual({ Alice: 10, Bob: 0 });
  });
});
