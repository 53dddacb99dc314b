/**
 * Unit tests for roundScoring.ts
 */

import { describe, it, expect } from "vitest";
import {
  formatRp,
  newHandicap,
  performancePoints,
  roundHalfAwayFromZero,
  roundRp,
  scoreRound,
  trailEntry,
} from "./roundScoring.js";
import { DEFAULT_LEAGUE_CONFIG, EXTENDED_HANDICAP_BANDS, type LeagueConfig } from "../constants.js";

const config = DEFAULT_LEAGUE_CONFIG;

function withHandicap(overrides: Partial<LeagueConfig["handicap"]>): LeagueConfig {
  return { ...config, handicap: { ...config.handicap, ...overrides } };
}

// --- helpers ---

describe("roundHalfAwayFromZero", () => {
  it("rounds halves away from zero in both directions", () => {
    expect(roundHalfAwayFromZero(4.5)).toBe(5);
    expect(roundHalfAwayFromZero(-4.5)).toBe(-5);
    expect(roundHalfAwayFromZero(2.4)).toBe(2);
  });
});

describe("roundRp", () => {
  it("holds RP to hundredths so a total adds and subtracts back", () => {
    expect(roundRp(4 / 3)).toBe(1.33);
    expect(roundRp(3.2 + 11.2)).toBe(14.4);
    expect(roundRp(roundRp(3.2 + 11.2) - 11.2)).toBe(3.2);
  });
});

describe("formatRp / trailEntry", () => {
  it("keeps integers bare and trims fractions", () => {
    expect(formatRp(2)).toBe("2");
    expect(formatRp(1.5)).toBe("1.5");
    expect(formatRp(2 / 3)).toBe("0.666667");
  });

  it("signs positive and negative entries", () => {
    expect(trailEntry("Giant Slayer", 1)).toBe("Giant Slayer (+1)");
    expect(trailEntry("Stbl Perf", -5)).toBe("Stbl Perf (-5)");
  });
});

// --- performancePoints ---

describe("performancePoints", () => {
  it("doubles every point above target", () => {
    expect(performancePoints(40, 36, 2)).toBe(8);
    expect(performancePoints(36, 36, 2)).toBe(0);
  });

  it("halves the deficit below target, rounding away from zero", () => {
    expect(performancePoints(27, 36, 2)).toBe(-5);
    expect(performancePoints(35, 36, 2)).toBe(-1);
    expect(performancePoints(34, 36, 2)).toBe(-1);
  });
});

// --- scoreRound ---

describe("scoreRound", () => {
  it("scores a solo 18-hole round", () => {
    const score = scoreRound({ stableford: 40, holesPlayed: 18 }, config);
    expect(score).toEqual({ baseRp: 10, performance: 8, participation: 2, trail: "Stbl Perf (+8), Part (+2)" });
  });

  it("uses the 9-hole target and participation", () => {
    const score = scoreRound({ stableford: 20, holesPlayed: 9 }, config);
    expect(score.baseRp).toBe(5);
    expect(score.trail).toBe("Stbl Perf (+4), Part (+1)");
  });

  it("adds every flag bonus in trail order", () => {
    const score = scoreRound(
      { stableford: 27, holesPlayed: 18, cleanSheet: true, holeInOne: true, roadWarrior: true },
      config
    );
    expect(score.baseRp).toBe(11);
    expect(score.trail).toBe(
      "Stbl Perf (-5), Part (+2), Road Warrior (+2), Clean Sheet (+2), Hole-in-One (+10)"
    );
  });

  it("places cohort bonuses after participation", () => {
    const score = scoreRound(
      { stableford: 36, holesPlayed: 18, extraBonus: 3, extraTrail: ["Winner of Day (+3)"] },
      config
    );
    expect(score.baseRp).toBe(5);
    expect(score.trail).toBe("Stbl Perf (+0), Part (+2), Winner of Day (+3)");
  });

  it("clamps participation to what is left under the season cap", () => {
    const partial = scoreRound({ stableford: 36, holesPlayed: 18, participationRemaining: 1 }, config);
    expect(partial.participation).toBe(1);
    expect(partial.trail).toBe("Stbl Perf (+0), Part (+1, Season Cap)");

    const exhausted = scoreRound({ stableford: 36, holesPlayed: 18, participationRemaining: -3 }, config);
    expect(exhausted.participation).toBe(0);
    expect(exhausted.trail).toBe("Stbl Perf (+0), Part (+0, Season Cap)");

    const plenty = scoreRound({ stableford: 36, holesPlayed: 18, participationRemaining: 5 }, config);
    expect(plenty.trail).toBe("Stbl Perf (+0), Part (+2)");
  });
});

// --- newHandicap ---

describe("newHandicap", () => {
  it("applies the default band table", () => {
    expect(newHandicap(18, 40, config)).toBe(16);
    expect(newHandicap(18, 38, config)).toBe(17);
    expect(newHandicap(18, 30, config)).toBe(18);
    expect(newHandicap(18, 20, config)).toBe(19);
  });

  it("cuts a sandbagger one stroke per point above 36", () => {
    expect(newHandicap(40, 42, config)).toBe(34);
    expect(newHandicap(40, 36, config)).toBe(40);
  });

  it("caps the sandbagger cut when configured", () => {
    expect(newHandicap(40, 42, withHandicap({ sandbaggerMaxCut: 3 }))).toBe(37);
  });

  it("rounds the input to one decimal and floors at zero", () => {
    expect(newHandicap(10.26, 38, config)).toBe(9.3);
    expect(newHandicap(0.5, 45, config)).toBe(0);
  });

  it("supports the extended band table", () => {
    const extended = withHandicap({ bands: EXTENDED_HANDICAP_BANDS });
    expect(newHandicap(18, 46, extended)).toBe(13);
    expect(newHandicap(18, 31, extended)).toBe(19);
  });

  it("never rises when the score improves and never goes negative", () => {
    for (const hcp of [0, 5.5, 18, 36, 36.5, 40, 54]) {
      for (let score = 0; score < 60; score++) {
        const worse = newHandicap(hcp, score, config);
        const better = newHandicap(hcp, score + 1, config);
        expect(better).toBeLessThanOrEqual(worse);
        expect(better).toBeGreaterThanOrEqual(0);
      }
    }
  });
});
