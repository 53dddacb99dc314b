/**
 * League configuration loading.
 * Overrides arrive as JSON (the LEAGUE_CONFIG_JSON function param) and are
 * merged over DEFAULT_LEAGUE_CONFIG section by section.
 */

import { z } from "zod";

import { DEFAULT_LEAGUE_CONFIG, type LeagueConfig } from "./constants.js";
import { LeagueError } from "./errors.js";

const bandSchema = z.object({
  min: z.number().nullable(),
  max: z.number().nullable(),
  delta: z.number(),
});

const potTierSchema = z.object({
  minPlayers: z.number().int().min(1),
  pot: z.number().min(0),
});

const awardBonus = z.number().min(0);

const overridesSchema = z
  .object({
    scoring: z
      .object({
        targetStableford: z.object({ 18: z.number(), 9: z.number() }),
        participation: z.object({ 18: z.number().min(0), 9: z.number().min(0) }),
        participationSeasonCap: z.number().min(0).nullable(),
        performanceMultiplier: z.number(),
        cleanSheetBonus: z.number(),
        holeInOneBonus: z.number(),
        roadWarriorBonus: z.number(),
      })
      .partial(),
    handicap: z
      .object({
        sandbaggerThreshold: z.number(),
        sandbaggerMaxCut: z.number().min(0).nullable(),
        bands: z.array(bandSchema).min(1),
      })
      .partial(),
    group: z
      .object({
        potTiers: z.array(potTierSchema),
        nineHolePotFactor: z.number().min(0),
        potSplit: z.enum(["exact", "ceil"]),
        giantSlayerBonus: z.number(),
      })
      .partial(),
    rivalry: z
      .object({
        duelFavoriteStake: z.number().min(0),
        duelUpsetStake: z.number().min(0),
        allianceStake: z.number().min(0),
        duoDebutBonus: z.number().min(0),
      })
      .partial(),
    awards: z
      .object({
        rock: z.object({ bonus: awardBonus, minRounds: z.number().int().min(1) }).partial(),
        sniper: z
          .object({ bonus: awardBonus, grossFloor: z.number(), window: z.enum(["all", "month"]) })
          .partial(),
        conqueror: z.object({ bonus: awardBonus, minWins: z.number().int().min(1) }).partial(),
        rocket: z.object({ bonus: awardBonus, minRounds: z.number().int().min(0) }).partial(),
      })
      .partial(),
    podiumRewards: z.array(z.number().min(0)),
  })
  .partial()
  .strict();

export type LeagueConfigOverrides = z.infer<typeof overridesSchema>;

export function mergeLeagueConfig(overrides: LeagueConfigOverrides, base: LeagueConfig = DEFAULT_LEAGUE_CONFIG): LeagueConfig {
  const awards = overrides.awards ?? {};
  return {
    scoring: {
      ...base.scoring,
      ...overrides.scoring,
      targetStableford: { ...base.scoring.targetStableford, ...overrides.scoring?.targetStableford },
      participation: { ...base.scoring.participation, ...overrides.scoring?.participation },
    },
    handicap: { ...base.handicap, ...overrides.handicap },
    group: { ...base.group, ...overrides.group },
    rivalry: { ...base.rivalry, ...overrides.rivalry },
    awards: {
      rock: { ...base.awards.rock, ...awards.rock },
      sniper: { ...base.awards.sniper, ...awards.sniper },
      conqueror: { ...base.awards.conqueror, ...awards.conqueror },
      rocket: { ...base.awards.rocket, ...awards.rocket },
    },
    podiumRewards: overrides.podiumRewards ?? base.podiumRewards,
  };
}

/**
 * Parse a JSON override string. Blank input means "use the defaults".
 * Throws LeagueError("failed-precondition") on malformed JSON or unknown keys.
 */
export function loadLeagueConfig(json: string | undefined): LeagueConfig {
  const raw = (json ?? "").trim();
  if (!raw) return DEFAULT_LEAGUE_CONFIG;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LeagueError("failed-precondition", `League config is not valid JSON: ${reason}`);
  }

  const result = overridesSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new LeagueError(
      "failed-precondition",
      `Invalid league config at ${first.path.join(".") || "(root)"}: ${first.message}`
    );
  }
  return mergeLeagueConfig(result.data);
}
