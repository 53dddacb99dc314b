/**
 * Seed Players Script
 *
 * Registers league players in Firestore from a JSON file.
 * Run with: npm run seed:players -- --input players.json
 *
 * Input JSON format:
 * [
 *   { "name": "Alice", "handicap": 18.4 },
 *   { "name": "Bob", "handicap": 12 }
 * ]
 *
 * Players that already exist are skipped; everything else goes through the
 * same validation as the registerPlayer callable.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { cert, initializeApp } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";

import { isLeagueError } from "../functions/src/errors.js";
import { LeagueService } from "../functions/src/leagueService.js";
import { FirestoreLeagueStore } from "../functions/src/store/firestoreLeagueStore.js";

// Uses service-account.json at the repo root when present, else default credentials
const serviceAccountPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "../service-account.json");

if (fs.existsSync(serviceAccountPath)) {
  initializeApp({ credential: cert(JSON.parse(fs.readFileSync(serviceAccountPath, "utf8"))) });
} else {
  initializeApp();
}

const service = new LeagueService(new FirestoreLeagueStore(getFirestore()));

function readInput(): unknown[] {
  const flag = process.argv.indexOf("--input");
  const file = flag >= 0 ? process.argv[flag + 1] : undefined;
  if (!file) throw new Error("Usage: seed-players --input players.json");

  const parsed: unknown = JSON.parse(fs.readFileSync(path.resolve(file), "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`${file} must contain a JSON array`);
  return parsed;
}

async function main() {
  const entries = readInput();
  console.log(`Seeding ${entries.length} players...`);

  let created = 0;
  let skipped = 0;
  for (const entry of entries) {
    try {
      const player = await service.registerPlayer(entry);
      console.log(`  ✓ ${player.name} (${player.handicap})`);
      created++;
    } catch (err) {
      if (isLeagueError(err) && err.code === "already-exists") {
        console.log(`  - ${err.message}, skipping`);
        skipped++;
        continue;
      }
      throw err;
    }
  }

  console.log(`\nDone: ${created} created, ${skipped} skipped.`);
}

main().catch((err) => {
  console.error("Seeding failed:", err);
  process.exit(1);
});
