/**
 * One playable library entry. `id` is the Plex ratingKey, opaque and stable
 * for the lifetime of a request.
 */
export interface TrackRecord {
  id: string;
  title: string;
  artist: string;
  album: string;
  genres: string[];
  year: number | null;
  /** 0-10, as Plex stores user ratings. */
  rating: number | null;
  /** Seconds. */
  duration: number;
}

export interface MusicLibrary {
  key: string;
  name: string;
}

export interface PlaylistHandle {
  id: string;
  title: string;
  trackCount: number;
}
