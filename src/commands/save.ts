import { Command } from "commander";
import fs from "fs";
import { loadConfig } from "../lib/config";
import { createPlexClient } from "../services";

function coerceId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return String(Math.floor(value));
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

/**
 * Accepts what `generate --format json` or `--format ids` prints: an object
 * with `tracks`, a bare array of tracks or ids, or newline-separated ids.
 */
export function extractTrackIds(raw: string): string[] {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return raw
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  const collection = Array.isArray(payload)
    ? payload
    : typeof payload === "object" && payload !== null
      ? "tracks" in payload
        ? payload.tracks
        : undefined
      : [payload];

  if (!Array.isArray(collection)) {
    return [];
  }
  const entries: unknown[] = collection;

  const ids: string[] = [];
  for (const item of entries) {
    if (typeof item === "object" && item !== null) {
      const id =
        ("id" in item ? coerceId(item.id) : null) ??
        ("ratingKey" in item ? coerceId(item.ratingKey) : null);
      if (id && !ids.includes(id)) ids.push(id);
      continue;
    }
    const id = coerceId(item);
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (chunk) => {
      data += chunk;
    });
    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", (error) => reject(error));
  });
}

export async function runSave(name: string, inputPath: string | undefined): Promise<void> {
  let raw = "";

  if (inputPath) {
    raw = fs.readFileSync(inputPath, "utf8");
  } else if (!process.stdin.isTTY) {
    raw = await readStdin();
  } else {
    throw new Error("Provide a playlist file path or pipe JSON via stdin.");
  }

  const ids = extractTrackIds(raw);
  if (ids.length === 0) {
    throw new Error("No track IDs found in input.");
  }

  const config = loadConfig();
  const handle = await createPlexClient(config).savePlaylist(name, ids);
  console.log(`Saved "${handle.title}" with ${handle.trackCount} tracks (playlist ${handle.id}).`);
}

export function registerSaveCommand(program: Command): void {
  program
    .command("save")
    .description("Save a generated playlist to Plex")
    .argument("<name>", "Playlist name")
    .argument("[input]", "Playlist JSON or id list (or stdin)")
    .action(async (name: string, input: string | undefined) => {
      await runSave(name, input);
    });
}
