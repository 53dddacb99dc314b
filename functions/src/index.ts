/**
 * Cloud Functions for the league ranking engine
 *
 * Every callable validates its payload, then hands off to LeagueService.
 *
 * Structure:
 * - leagueService.ts - submission and read flows
 * - store/firestoreLeagueStore.ts - persistence (players, matchRecords)
 * - scoring/, awards/, standings.ts - pure engine
 * - config.ts - LEAGUE_CONFIG_JSON overrides on top of the defaults
 */

import { onCall, type CallableRequest } from "firebase-functions/v2/https";
import { defineString } from "firebase-functions/params";
import * as logger from "firebase-functions/logger";
import { initializeApp } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";

import { loadLeagueConfig } from "./config.js";
import { toHttpsError } from "./httpsErrors.js";
import { LeagueService } from "./leagueService.js";
import { FirestoreLeagueStore } from "./store/firestoreLeagueStore.js";
import { AsOfSchema, MatchGroupSchema, RemovePlayerSchema, parsePayload } from "./validation.js";

initializeApp();
const db = getFirestore();

/** JSON overrides merged onto DEFAULT_LEAGUE_CONFIG; blank keeps the defaults */
const leagueConfigJson = defineString("LEAGUE_CONFIG_JSON", { default: "" });

// Params resolve at runtime only, so the service is built on first call
let service: LeagueService | null = null;

function getService(): LeagueService {
  if (!service) {
    service = new LeagueService(new FirestoreLeagueStore(db), {
      config: loadLeagueConfig(leagueConfigJson.value()),
      logger,
    });
  }
  return service;
}

function leagueCallable<T>(name: string, handler: (svc: LeagueService, data: unknown) => Promise<T>) {
  return onCall(async (request: CallableRequest<unknown>) => {
    try {
      return await handler(getService(), request.data);
    } catch (err) {
      throw toHttpsError(err, name);
    }
  });
}

// ============================================================================
// PLAYERS
// ============================================================================

export const registerPlayer = leagueCallable("registerPlayer", (svc, data) => svc.registerPlayer(data));

export const removePlayer = leagueCallable("removePlayer", (svc, data) =>
  svc.removePlayer(parsePayload(RemovePlayerSchema, data).name)
);

// ============================================================================
// SUBMISSIONS
// ============================================================================

export const submitStandardRound = leagueCallable("submitStandardRound", (svc, data) =>
  svc.submitStandardRound(data)
);

export const submitDuel = leagueCallable("submitDuel", (svc, data) => svc.submitDuel(data));

export const submitAlliance = leagueCallable("submitAlliance", (svc, data) => svc.submitAlliance(data));

export const deleteMatchGroup = leagueCallable("deleteMatchGroup", (svc, data) =>
  svc.deleteMatchGroup(parsePayload(MatchGroupSchema, data).groupId)
);

// ============================================================================
// READS & REPAIR
// ============================================================================

export const getStandings = leagueCallable("getStandings", (svc, data) =>
  svc.getStandings(parsePayload(AsOfSchema, data ?? {}).asOf)
);

export const getAwards = leagueCallable("getAwards", (svc, data) =>
  svc.getAwards(parsePayload(AsOfSchema, data ?? {}).asOf)
);

export const getMatchHistory = leagueCallable("getMatchHistory", (svc) => svc.getMatchHistory());

export const rebuildAggregates = leagueCallable("rebuildAggregates", (svc) => svc.rebuildAggregates());
