/**
 * Ranking engine without Firestore: scoring, awards, standings and the
 * service over any LeagueStore.
 */

export * from "./types.js";
export * from "./constants.js";
export { LeagueError, isLeagueError, type LeagueErrorCode } from "./errors.js";
export { loadLeagueConfig, mergeLeagueConfig, type LeagueConfigOverrides } from "./config.js";
export * from "./seasons.js";
export * from "./scoring/roundScoring.js";
export * from "./scoring/groupBonuses.js";
export * from "./scoring/rivalry.js";
export * from "./awards/headToHead.js";
export * from "./awards/awardEngine.js";
export * from "./standings.js";
export { LeagueService, type LeagueLogger, type LeagueServiceOptions } from "./leagueService.js";
export type { LeagueStore } from "./store/leagueStore.js";
export { MemoryLeagueStore } from "./store/memoryLeagueStore.js";
