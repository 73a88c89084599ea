import { describe, expect, it } from "vitest";
import { track } from "../test/fixtures";
import { formatLibrarySummary, searchTracks, summarizeLibrary } from "./library";

const tracks = [
  track({ id: "1", title: "Heroes", artist: "David Bowie", album: "Heroes", genres: ["Rock", "Glam"], year: 1977 }),
  track({ id: "2", title: "Ashes to Ashes", artist: "David Bowie", album: "Scary Monsters", genres: ["Rock"], year: 1980 }),
  track({ id: "3", title: "Jóga", artist: "Björk", album: "Homogenic", genres: ["Electronic"], year: 1997 }),
  track({ id: "4", title: "Untitled", artist: "Unknown", album: "", genres: [], year: null }),
];

describe("summarizeLibrary", () => {
  it("counts genres and decades", () => {
    expect(summarizeLibrary(tracks)).toEqual({
      trackCount: 4,
      genres: [
        { name: "Rock", count: 2 },
        { name: "Electronic", count: 1 },
        { name: "Glam", count: 1 },
      ],
      decades: [
        { name: "1970s", count: 1 },
        { name: "1980s", count: 1 },
        { name: "1990s", count: 1 },
      ],
      yearRange: { min: 1977, max: 1997 },
    });
  });

  it("keeps only the most common genres", () => {
    expect(summarizeLibrary(tracks, 1).genres).toEqual([{ name: "Rock", count: 2 }]);
  });

  it("summarizes an empty library", () => {
    expect(formatLibrarySummary(summarizeLibrary([]))).toBe(
      "Library: 0 tracks\nGenres: none tagged\nDecades: unknown"
    );
  });
});

describe("searchTracks", () => {
  it("requires every word across artist, title and album", () => {
    expect(searchTracks(tracks, "bowie heroes").map((entry) => entry.id)).toEqual(["1"]);
    expect(searchTracks(tracks, "BOWIE").map((entry) => entry.id)).toEqual(["1", "2"]);
  });

  it("ignores diacritics", () => {
    expect(searchTracks(tracks, "bjork joga").map((entry) => entry.id)).toEqual(["3"]);
  });

  it("honors the limit and ignores blank queries", () => {
    expect(searchTracks(tracks, "bowie", 1).map((entry) => entry.id)).toEqual(["1"]);
    expect(searchTracks(tracks, "  ")).toEqual([]);
  });
});
