import type { MusicLibrary, PlaylistHandle, TrackRecord } from "./types";

/**
 * Read access to a music server's library. Every call returns a fresh
 * snapshot; nothing is cached between requests.
 * Fails with RepositoryUnavailableError when the server cannot be reached.
 */
export interface TrackRepository {
  listTracks(libraryName: string): Promise<TrackRecord[]>;
  listMusicLibraries(): Promise<MusicLibrary[]>;
}

/**
 * Fails with SaveFailedError when any id no longer resolves in the library.
 */
export interface PlaylistSaver {
  savePlaylist(name: string, trackIds: string[]): Promise<PlaylistHandle>;
}

export type CompletionRequest = {
  prompt: string;
  system?: string | undefined;
  model: string;
  maxTokens: number;
};

export type Completion = {
  text: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
};

/**
 * Text completion against a hosted model.
 * Fails with ProviderError; `retryable` marks transport and rate-limit failures.
 */
export interface LlmClient {
  complete(request: CompletionRequest): Promise<Completion>;
}
