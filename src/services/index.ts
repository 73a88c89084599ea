import { requirePlexCredentials, type AppConfig } from "../lib/config";
import { PlexClient } from "./plex";

export { PlexClient } from "./plex";
export type { LlmClient, PlaylistSaver, TrackRepository } from "./provider";
export type { MusicLibrary, PlaylistHandle, TrackRecord } from "./types";

export function createPlexClient(config: AppConfig): PlexClient {
  requirePlexCredentials(config);
  return new PlexClient({ baseUrl: config.plex.url, token: config.plex.token });
}
