/**
 * Unit tests for standings.ts
 */

import { describe, it, expect } from "vitest";
import {
  buildStandings,
  closedSeasons,
  countDailyWins,
  playerRecord,
  rebuildPlayerAggregates,
  standingsSnapshot,
} from "./standings.js";
import { DEFAULT_LEAGUE_CONFIG } from "./constants.js";
import type { MatchRecord, Player } from "./types.js";

const config = DEFAULT_LEAGUE_CONFIG;

// --- HELPERS ---

function row(playerName: string, group: string, overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    playerName,
    date: "2026-02-10",
    season: "Season 1",
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
    createdAt: "2026-02-10T10:00:00.000Z",
    ...overrides,
  };
}

function player(name: string, overrides: Partial<Player> = {}): Player {
  return { name, handicap: 18, startingHandicap: 18, roundsPlayed: 1, totalRp: 0, ...overrides };
}

/** One Season 1 round: Alice wins, Bob second, Cara last */
const players = [player("Alice"), player("Bob"), player("Cara")];
const rounds = [
  row("Alice", "g1", { rpEarned: 10, stablefordScore: 40, grossScore: 80, outcome: "Win" }),
  row("Bob", "g1", { rpEarned: 3, stablefordScore: 34, grossScore: 88 }),
  row("Cara", "g1", { rpEarned: -2, stablefordScore: 28, grossScore: 95 }),
];

// --- records ---

describe("playerRecord / countDailyWins", () => {
  const history = [
    row("Alice", "d1", { matchType: "Duel", outcome: "Win" }),
    row("Alice", "d2", { matchType: "Duel", outcome: "Loss" }),
    row("Alice", "a1", { matchType: "Alliance", outcome: "Win" }),
    row("Alice", "a2", { matchType: "Alliance", outcome: "Tie" }),
    row("Alice", "g1", { outcome: "Win" }),
  ];

  it("formats duel and alliance records", () => {
    expect(playerRecord(history, "Alice", "Duel")).toBe("1-1");
    expect(playerRecord(history, "Alice", "Alliance")).toBe("1-0-1");
    expect(playerRecord(history, "Bob", "Duel")).toBe("0-0");
  });

  it("counts every win", () => {
    expect(countDailyWins(history, "Alice")).toBe(3);
  });
});

// --- live standings ---

describe("buildStandings", () => {
  it("adds the live award overlay while the season is open", () => {
    const standings = buildStandings({ players, rounds, asOf: "2026-03-31" }, config);
    expect(standings.closedSeasons).toEqual([]);
    expect(standings.rows.map((r) => [r.rank, r.name, r.totalRp])).toEqual([
      [1, "Alice", 15],
      [2, "Bob", 3],
      [3, "Cara", -2],
    ]);
    expect(standings.rows[0].awards).toEqual(["sniper"]);
    expect(standings.rows[0].awardBonus).toBe(5);
  });

  it("pays season awards and podium rewards once the season has closed", () => {
    const standings = buildStandings({ players, rounds, asOf: "2026-04-15" }, config);
    const [season] = standings.closedSeasons;

    expect(season.key).toBe("2026 Season 1");
    expect(season.totals).toEqual({ Alice: 15, Bob: 3, Cara: -2 });
    expect(season.podium).toEqual([
      { name: "Alice", seasonRp: 15, reward: 15 },
      { name: "Bob", seasonRp: 3, reward: 10 },
    ]);

    const alice = standings.rows[0];
    expect(alice.lifetimeRp).toBe(10);
    expect(alice.awardBonus).toBe(5);
    expect(alice.seasonBonus).toBe(20);
    expect(alice.totalRp).toBe(35);
    expect(standings.rows.map((r) => [r.name, r.totalRp])).toEqual([
      ["Alice", 35],
      ["Bob", 13],
      ["Cara", -2],
    ]);
  });

  it("fills in per-player summaries", () => {
    const standings = buildStandings({ players: [...players, player("Dev", { roundsPlayed: 0 })], rounds, asOf: "2026-03-01" }, config);
    const byName = new Map(standings.rows.map((r) => [r.name, r]));
    expect(byName.get("Alice")?.bestGross).toBe(80);
    expect(byName.get("Alice")?.averageStableford).toBe(40);
    expect(byName.get("Alice")?.dailyWins).toBe(1);
    expect(byName.get("Dev")?.bestGross).toBeNull();
    expect(byName.get("Dev")?.averageStableford).toBeNull();
  });

  it("breaks equal totals by name", () => {
    const standings = buildStandings({ players: [player("Zed"), player("Amy")], rounds: [], asOf: "2026-03-01" }, config);
    expect(standings.rows.map((r) => r.name)).toEqual(["Amy", "Zed"]);
  });
});

describe("closedSeasons", () => {
  it("skips seasons that are still running", () => {
    expect(closedSeasons({ players, rounds, asOf: "2026-02-11" }, config)).toEqual([]);
  });
});

describe("standingsSnapshot", () => {
  it("maps each player to their total", () => {
    expect(standingsSnapshot({ players, rounds, asOf: "2026-03-31" }, config)).toEqual({ Alice: 15, Bob: 3, Cara: -2 });
  });
});

// --- repair ---

describe("rebuildPlayerAggregates", () => {
  it("recomputes totals and takes the handicap from the latest row", () => {
    const history = [
      row("Alice", "g2", { date: "2026-02-20", rpEarned: 4, newHandicap: 16 }),
      row("Alice", "g1", { date: "2026-02-10", rpEarned: 6, newHandicap: 17 }),
    ];
    const aggregates = rebuildPlayerAggregates([player("Alice"), player("Bob", { startingHandicap: 12 })], history);
    expect(aggregates).toEqual([
      { name: "Alice", handicap: 16, roundsPlayed: 2, totalRp: 10 },
      { name: "Bob", handicap: 12, roundsPlayed: 0, totalRp: 0 },
    ]);
  });
});
