import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Band } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const bandTableSchema = z.object({
  nineHundredMhzBoards: z.array(z.string()),
  twoGhzChannels: z.array(z.string()),
  threeGhzChannels: z.array(z.string()),
  fiveGhzChannels: z.array(z.string()),
});

interface BandTable {
  nineHundredMhzBoards: Set<string>;
  twoGhzChannels: Set<string>;
  threeGhzChannels: Set<string>;
  fiveGhzChannels: Set<string>;
}

let table: BandTable | null = null;

/**
 * Load the channel tables once. Some firmware reports the 3 GHz band as a
 * frequency instead of a channel number, so both forms are listed there.
 */
function getBandTable(): BandTable {
  if (table) return table;
  // __dirname = <root>/src/collector OR <root>/dist/collector
  const file = path.resolve(__dirname, "../../data/band-channels.json");
  const raw = bandTableSchema.parse(JSON.parse(readFileSync(file, "utf8")));
  table = {
    nineHundredMhzBoards: new Set(raw.nineHundredMhzBoards),
    twoGhzChannels: new Set(raw.twoGhzChannels),
    threeGhzChannels: new Set(raw.threeGhzChannels),
    fiveGhzChannels: new Set(raw.fiveGhzChannels),
  };
  return table;
}

export function deriveBand(radioStatus: string, boardId: string, channel: string): Band {
  if (radioStatus !== "on") return "Off";
  const t = getBandTable();
  if (t.nineHundredMhzBoards.has(boardId)) return "900MHz";
  if (t.twoGhzChannels.has(channel)) return "2.4GHz";
  if (t.threeGhzChannels.has(channel)) return "3.4GHz";
  if (t.fiveGhzChannels.has(channel)) return "5.8GHz";
  return "Unknown";
}
