import { RepositoryUnavailableError, SaveFailedError } from "../lib/errors";
import { debug, log } from "../lib/logger";
import type { PlaylistSaver, TrackRepository } from "./provider";
import type { MusicLibrary, PlaylistHandle, TrackRecord } from "./types";

export type FetchLike = (
  input: string,
  init?: { method?: string; headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

export type PlexClientOptions = {
  baseUrl: string;
  token: string;
  fetchFn?: FetchLike | undefined;
  pageSize?: number | undefined;
  timeoutMs?: number | undefined;
};

type PlexItem = Record<string, unknown>;

const DEFAULT_PAGE_SIZE = 5000;
const DEFAULT_TIMEOUT_MS = 30000;
const TRACK_TYPE = 10;

export function normalizeBaseUrl(input: string): string {
  return input.replace(/\/+$/, "");
}

function asRecord(value: unknown): PlexItem | null {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as PlexItem)
    : null;
}

function mediaContainer(payload: unknown): PlexItem {
  return asRecord(asRecord(payload)?.MediaContainer) ?? {};
}

function items(container: PlexItem, field: "Metadata" | "Directory"): PlexItem[] {
  const list = container[field];
  if (!Array.isArray(list)) return [];
  return list.flatMap((entry) => {
    const record = asRecord(entry);
    return record ? [record] : [];
  });
}

function stringField(value: unknown): string | null {
  if (typeof value === "string" && value.trim().length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function numberField(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

export function toTrackRecord(item: PlexItem): TrackRecord | null {
  const id = stringField(item.ratingKey);
  const title = stringField(item.title);
  if (!id || !title) return null;

  const genres = Array.isArray(item.Genre)
    ? item.Genre.flatMap((genre) => {
        const tag = stringField(asRecord(genre)?.tag);
        return tag ? [tag] : [];
      })
    : [];

  const year = numberField(item.parentYear) ?? numberField(item.year);
  const durationMs = numberField(item.duration);

  return {
    id,
    title,
    artist: stringField(item.grandparentTitle) ?? stringField(item.originalTitle) ?? "Unknown",
    album: stringField(item.parentTitle) ?? "",
    genres,
    year: year != null ? Math.trunc(year) : null,
    rating: numberField(item.userRating),
    duration: durationMs != null ? Math.round(durationMs / 1000) : 0,
  };
}

/**
 * Thin adapter over the Plex Media Server REST API.
 * Serves as both the track repository and the playlist saver.
 */
export class PlexClient implements TrackRepository, PlaylistSaver {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchFn: FetchLike;
  private readonly pageSize: number;
  private readonly timeoutMs: number;

  constructor(options: PlexClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? fetch;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async request(
    path: string,
    method: "GET" | "POST" = "GET",
    headers: Record<string, string> = {}
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const url = `${this.baseUrl}${path}`;
    try {
      let response: Awaited<ReturnType<FetchLike>>;
      try {
        response = await this.fetchFn(url, {
          method,
          headers: {
            Accept: "application/json",
            "X-Plex-Token": this.token,
            ...headers,
          },
          signal: controller.signal,
        });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new RepositoryUnavailableError(`network error ${msg} (${path})`);
      }
      if (!response.ok) {
        throw new RepositoryUnavailableError(`Plex returned ${response.status} (${path})`);
      }
      return await response.json();
    } finally {
      clearTimeout(timeout);
    }
  }

  async listMusicLibraries(): Promise<MusicLibrary[]> {
    const payload = await this.request("/library/sections");
    return items(mediaContainer(payload), "Directory").flatMap((section) => {
      const key = stringField(section.key);
      const name = stringField(section.title);
      if (section.type !== "artist" || !key || !name) return [];
      return [{ key, name }];
    });
  }

  private async resolveLibraryKey(libraryName: string): Promise<string> {
    const libraries = await this.listMusicLibraries();
    const wanted = libraryName.trim().toLowerCase();
    const library = libraries.find((entry) => entry.name.toLowerCase() === wanted);
    if (!library) {
      const available = libraries.map((entry) => entry.name).join(", ") || "none";
      throw new RepositoryUnavailableError(
        `no music library named "${libraryName}" (available: ${available})`
      );
    }
    return library.key;
  }

  async listTracks(libraryName: string): Promise<TrackRecord[]> {
    const key = await this.resolveLibraryKey(libraryName);
    const tracks: TrackRecord[] = [];
    let start = 0;

    for (;;) {
      const payload = await this.request(
        `/library/sections/${encodeURIComponent(key)}/all?type=${TRACK_TYPE}` +
          `&X-Plex-Container-Start=${start}&X-Plex-Container-Size=${this.pageSize}`
      );
      const container = mediaContainer(payload);
      const page = items(container, "Metadata");
      for (const item of page) {
        const track = toTrackRecord(item);
        if (track) tracks.push(track);
      }

      start += page.length;
      const totalSize = numberField(container.totalSize);
      debug(`[plex] Fetched ${start}${totalSize != null ? `/${totalSize}` : ""} tracks`);
      if (page.length === 0 || page.length < this.pageSize) break;
      if (totalSize != null && start >= totalSize) break;
    }

    log(`[plex] Loaded ${tracks.length} tracks from "${libraryName}"`);
    return tracks;
  }

  private async fetchExistingIds(trackIds: string[]): Promise<Set<string>> {
    const path = `/library/metadata/${trackIds.map(encodeURIComponent).join(",")}`;
    const payload = await this.request(path);
    const found = new Set<string>();
    for (const item of items(mediaContainer(payload), "Metadata")) {
      const id = stringField(item.ratingKey);
      if (id) found.add(id);
    }
    return found;
  }

  async savePlaylist(name: string, trackIds: string[]): Promise<PlaylistHandle> {
    if (trackIds.length === 0) {
      throw new SaveFailedError("Cannot save an empty playlist.");
    }

    try {
      // The library may have changed since generation.
      const existing = await this.fetchExistingIds(trackIds);
      const missing = trackIds.filter((id) => !existing.has(id));
      if (missing.length > 0) {
        throw new SaveFailedError(
          `${missing.length} track(s) no longer exist in the library: ${missing.join(", ")}`,
          missing
        );
      }

      const identity = mediaContainer(await this.request("/identity"));
      const machineId = stringField(identity.machineIdentifier);
      if (!machineId) {
        throw new SaveFailedError("Plex did not report a machine identifier.");
      }

      const uri =
        `server://${machineId}/com.plexapp.plugins.library/library/metadata/` +
        trackIds.join(",");
      const query = new URLSearchParams({ type: "audio", title: name, smart: "0", uri });
      const created = items(
        mediaContainer(await this.request(`/playlists?${query.toString()}`, "POST")),
        "Metadata"
      )[0];
      const id = stringField(created?.ratingKey);
      if (!created || !id) {
        throw new SaveFailedError("Plex did not return the created playlist.");
      }

      return {
        id,
        title: stringField(created.title) ?? name,
        trackCount: numberField(created.leafCount) ?? trackIds.length,
      };
    } catch (err) {
      if (err instanceof RepositoryUnavailableError) {
        throw new SaveFailedError(`Could not save playlist: ${err.message}`);
      }
      throw err;
    }
  }
}
