/**
 * Callable error mapping
 */

import * as logger from "firebase-functions/logger";
import { HttpsError } from "firebase-functions/v2/https";
import { ZodError } from "zod";

import { isLeagueError } from "./errors.js";

/**
 * Map anything thrown by a handler to an HttpsError.
 * Known failures keep their message; anything else is logged and reported as "internal".
 */
export function toHttpsError(
  err: unknown,
  functionName: string,
  log: Pick<typeof logger, "error"> = logger
): HttpsError {
  if (err instanceof HttpsError) return err;
  if (isLeagueError(err)) return new HttpsError(err.code, err.message);
  if (err instanceof ZodError) {
    return new HttpsError("invalid-argument", err.issues.map((i) => i.message).join("; "));
  }
  // getSeason and friends reject impossible dates with a RangeError
  if (err instanceof RangeError) return new HttpsError("invalid-argument", err.message);

  log.error(`${functionName} failed`, err);
  return new HttpsError("internal", `${functionName} failed`);
}
