/**
 * Callable payload schemas.
 * Numbers may arrive as numbers or numeric strings from form posts; blanks and
 * non-numeric strings are rejected here, never read as zero.
 */

import { z } from "zod";

import { LeagueError } from "./errors.js";
import { isIsoDate } from "./seasons.js";

/** number, or a non-empty string that parses to a finite number */
const numeric = z.union([z.number(), z.string().trim().min(1, "Required")]).pipe(z.coerce.number().finite());

const integer = numeric.pipe(z.number().int());

const playerName = z
  .string()
  .trim()
  .min(1, "Player name is required")
  .max(60)
  .refine((s) => !s.includes("/") && s !== "." && s !== "..", "Player name cannot contain '/'");

const isoDate = z.string().trim().refine(isIsoDate, "Expected a date as YYYY-MM-DD");

const course = z.string().trim().min(1, "Course is required").max(100);

const handicap = numeric.pipe(z.number().min(0).max(54));

const flag = z.boolean().optional().default(false);

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) dupes.add(n);
    seen.add(n);
  }
  return [...dupes];
}

// --- PLAYERS ---

export const RegisterPlayerSchema = z.object({
  name: playerName,
  handicap,
});

export const RemovePlayerSchema = z.object({
  name: playerName,
});

// --- SUBMISSIONS ---

export const StandardRoundSchema = z
  .object({
    date: isoDate,
    course,
    holesPlayed: z.union([z.literal(18), z.literal(9)]).optional().default(18),
    players: z
      .array(
        z.object({
          name: playerName,
          gross: integer.pipe(z.number().min(0).max(200)),
          stableford: integer.pipe(z.number().min(0).max(60)),
          cleanSheet: flag,
          holeInOne: flag,
          roadWarrior: flag,
        })
      )
      .min(1, "At least one player is required"),
  })
  .superRefine((round, ctx) => {
    for (const name of duplicates(round.players.map((p) => p.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["players"], message: `${name} is listed more than once` });
    }
  });

export const DuelSchema = z
  .object({
    date: isoDate,
    course,
    playerOne: z.object({ name: playerName, strokes: integer.pipe(z.number().min(1).max(200)) }),
    playerTwo: z.object({ name: playerName, strokes: integer.pipe(z.number().min(1).max(200)) }),
  })
  .refine((d) => d.playerOne.name !== d.playerTwo.name, {
    message: "A duel needs two different players",
    path: ["playerTwo", "name"],
  });

const holesWon = integer.pipe(z.number().min(0).max(18));

export const AllianceSchema = z
  .object({
    date: isoDate,
    course,
    teamA: z.array(playerName).length(2, "Each team needs exactly 2 players"),
    teamB: z.array(playerName).length(2, "Each team needs exactly 2 players"),
    holesWonA: holesWon,
    holesWonB: holesWon,
  })
  .superRefine((a, ctx) => {
    for (const name of duplicates([...a.teamA, ...a.teamB])) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["teamB"], message: `${name} cannot play twice` });
    }
    if (a.holesWonA + a.holesWonB > 18) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["holesWonB"], message: "More than 18 holes won in total" });
    }
  });

export const MatchGroupSchema = z.object({
  groupId: z.string().trim().min(1, "groupId is required"),
});

export const AsOfSchema = z.object({
  asOf: isoDate.optional(),
});

export type RegisterPlayerInput = z.infer<typeof RegisterPlayerSchema>;
export type StandardRoundInput = z.infer<typeof StandardRoundSchema>;
export type DuelInput = z.infer<typeof DuelSchema>;
export type AllianceInput = z.infer<typeof AllianceSchema>;

/** "players.1.stableford: Expected number, received nan" */
export function describeZodError(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Validates a callable payload; failures become LeagueError("invalid-argument") */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) throw new LeagueError("invalid-argument", describeZodError(result.error));
  return result.data;
}
