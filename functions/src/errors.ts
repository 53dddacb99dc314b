/**
 * Error raised by the league service.
 * Codes mirror the callable error codes so the HTTPS layer can pass them through.
 */

export type LeagueErrorCode = "invalid-argument" | "not-found" | "already-exists" | "failed-precondition";

export class LeagueError extends Error {
  readonly code: LeagueErrorCode;

  constructor(code: LeagueErrorCode, message: string) {
    super(message);
    this.name = "LeagueError";
    this.code = code;
  }
}

export function isLeagueError(err: unknown): err is LeagueError {
  return err instanceof LeagueError;
}
