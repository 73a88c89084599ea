import type { ModelSettings } from "../lib/config";
import type {
  Completion,
  CompletionRequest,
  LlmClient,
  TrackRepository,
} from "../services/provider";
import type { MusicLibrary, TrackRecord } from "../services/types";

export function track(overrides: Partial<TrackRecord> & { id: string }): TrackRecord {
  return {
    title: `Track ${overrides.id}`,
    artist: "Test Artist",
    album: "Test Album",
    genres: [],
    year: null,
    rating: null,
    duration: 200,
    ...overrides,
  };
}

export const TEST_MODELS: ModelSettings = {
  analysisModel: "claude-sonnet-4-5",
  generationModel: "claude-haiku-4-5",
  smartGeneration: false,
};

/**
 * Replies in queue order; every reply reports 100 input and 50 output tokens.
 */
export class FakeLlm implements LlmClient {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("No reply queued");
    if (reply instanceof Error) throw reply;
    return { text: reply, inputTokens: 100, outputTokens: 50, model: request.model };
  }
}

export class FakeRepository implements TrackRepository {
  readonly requestedLibraries: string[] = [];

  constructor(private readonly tracks: TrackRecord[]) {}

  async listTracks(libraryName: string): Promise<TrackRecord[]> {
    this.requestedLibraries.push(libraryName);
    return this.tracks;
  }

  async listMusicLibraries(): Promise<MusicLibrary[]> {
    return [{ key: "1", name: "Music" }];
  }
}
