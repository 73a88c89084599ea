import { describe, expect, it } from "vitest";
import { track } from "../test/fixtures";
import {
  candidateKeys,
  matchedTracks,
  matchTracks,
  readingsOf,
  unmatchedIdentifications,
} from "./matcher";

const friday = track({ id: "1", title: "Friday I'm in Love", artist: "The Cure" });
const heaven = track({ id: "2", title: "Just Like Heaven", artist: "The Cure" });
const candidates = [friday, heaven];

describe("candidateKeys", () => {
  it("covers both orders and both spellings of the artist", () => {
    expect(candidateKeys(heaven)).toEqual([
      "the cure just like heaven",
      "just like heaven the cure",
      "cure just like heaven",
      "just like heaven cure",
    ]);
  });
});

describe("readingsOf", () => {
  it("reads a split both ways round", () => {
    expect(readingsOf("The Cure - Lovesong")).toEqual([
      { artists: ["the cure", "cure"], title: "lovesong" },
      { artists: ["lovesong"], title: "the cure" },
    ]);
  });

  it("has no readings without a separator", () => {
    expect(readingsOf("Lovesong by The Cure")).toEqual([]);
  });
});

describe("matchTracks", () => {
  it("matches an exact normalized identification", () => {
    const [result] = matchTracks(["just like heaven - the cure"], candidates);
    expect(result).toEqual({
      identification: "just like heaven - the cure",
      track: heaven,
      score: 100,
      method: "exact",
    });
  });

  it("ignores diacritics and punctuation for exact matches", () => {
    const sigur = track({ id: "9", title: "Hoppípolla", artist: "Sigur Rós" });
    const [result] = matchTracks(["Sigur Ros - Hoppipolla!"], [sigur]);
    expect(result?.method).toBe("exact");
    expect(result?.track).toBe(sigur);
  });

  it("matches a misspelled identification fuzzily", () => {
    const [result] = matchTracks(["Frriday Im in Lov - Cure"], candidates);
    expect(result?.method).toBe("fuzzy");
    expect(result?.track).toBe(friday);
    // two edits over the 17-character title; the artist matches outright
    expect(result?.score).toBeCloseTo(88.235, 3);
  });

  it("leaves a result unmatched below the threshold", () => {
    const [result] = matchTracks(["Frriday Im in Lov - Cure"], candidates, { threshold: 95 });
    expect(result?.method).toBe("unmatched");
    expect(result?.track).toBeNull();
    expect(result?.score).toBe(0);
  });

  it("does not fabricate a match for an unknown track", () => {
    const [result] = matchTracks(["Bohemian Rhapsody - Queen"], candidates);
    expect(result?.method).toBe("unmatched");
    expect(result?.track).toBeNull();
    expect(result?.score).toBeLessThan(60);
  });

  it("never returns the same track twice", () => {
    const results = matchTracks(
      ["The Cure - Just Like Heaven", "The Cure - Just Like Heaven"],
      candidates
    );
    expect(results).toHaveLength(2);
    expect(results[0]?.track).toBe(heaven);
    expect(results[1]?.track?.id).not.toBe("2");
  });

  it("keeps one result per identification in input order", () => {
    const results = matchTracks(
      ["", "Just Like Heaven - The Cure", "Friday I'm in Love - The Cure"],
      candidates
    );
    expect(results.map((result) => result.method)).toEqual(["unmatched", "exact", "exact"]);
    expect(results[0]).toEqual({ identification: "", track: null, score: 0, method: "unmatched" });
    expect(matchedTracks(results)).toEqual([heaven, friday]);
    expect(unmatchedIdentifications(results)).toEqual([""]);
  });

  it("prefers the higher-rated candidate on an exact tie", () => {
    const album = track({ id: "a", title: "Heroes", artist: "David Bowie", rating: 6 });
    const single = track({ id: "b", title: "Heroes", artist: "David Bowie", rating: 9 });
    const [result] = matchTracks(["David Bowie - Heroes"], [album, single]);
    expect(result?.track?.id).toBe("b");
  });

  it("prefers the higher-rated candidate on a fuzzy tie", () => {
    const unrated = track({ id: "a", title: "Heroes", artist: "David Bowie" });
    const rated = track({ id: "b", title: "Heroes", artist: "David Bowie", rating: 7 });
    const [result] = matchTracks(["David Bowie - Heroez"], [unrated, rated]);
    expect(result?.method).toBe("fuzzy");
    expect(result?.track?.id).toBe("b");
  });

  it("falls back to candidate order when ratings are equal", () => {
    const first = track({ id: "a", title: "Heroes", artist: "David Bowie", rating: 5 });
    const second = track({ id: "b", title: "Heroes", artist: "David Bowie", rating: 5 });
    const results = matchTracks(["David Bowie - Heroes", "David Bowie - Heroes"], [first, second]);
    expect(results.map((result) => result.track?.id)).toEqual(["a", "b"]);
  });

  it("never returns an excluded id", () => {
    const [result] = matchTracks(["Just Like Heaven - The Cure"], [heaven], {
      excludeIds: ["2"],
    });
    expect(result).toEqual({
      identification: "Just Like Heaven - The Cure",
      track: null,
      score: 0,
      method: "unmatched",
    });
  });

  it("does not swap a made-up title for another song by the same artist", () => {
    const otherside = track({ id: "5", title: "Otherside", artist: "Red Hot Chili Peppers" });
    const results = matchTracks(
      [
        "Red Hot Chili Peppers - Californication",
        "Red Hot Chili Peppers - Scar Tissue",
        "Red Hot Chili Peppers - Othersyde",
      ],
      [otherside]
    );
    expect(results.map((result) => result.method)).toEqual(["unmatched", "unmatched", "fuzzy"]);
    expect(results.map((result) => result.track?.id ?? null)).toEqual([null, null, "5"]);
  });

  it("needs the artist to match as well as the title", () => {
    const heroes = track({ id: "6", title: "Heroes", artist: "David Bowie" });
    const [result] = matchTracks(["Queen - Heroes"], [heroes]);
    expect(result).toEqual({
      identification: "Queen - Heroes",
      track: null,
      score: 0,
      method: "unmatched",
    });
  });

  it("reads title-first identifications", () => {
    const heroes = track({ id: "6", title: "Heroes", artist: "David Bowie" });
    const [result] = matchTracks(["Heroez - David Bowie"], [heroes]);
    expect(result?.track).toBe(heroes);
    // one edit over six characters
    expect(result?.score).toBeCloseTo(83.333, 3);
  });

  it("matches a title that contains the separator", () => {
    const letItBe = track({ id: "7", title: "Let It Be - Remastered 2009", artist: "The Beatles" });
    const [result] = matchTracks(["Beatles - Let It Bee - Remastered 2009"], [letItBe]);
    expect(result?.method).toBe("fuzzy");
    expect(result?.track).toBe(letItBe);
    expect(result?.score).toBeCloseTo(96.154, 3);
  });

  it("scores the whole identification when there is no separator", () => {
    const heroes = track({ id: "6", title: "Heroes", artist: "David Bowie" });
    const [result] = matchTracks(["Heroez David Bowie"], [heroes]);
    expect(result?.method).toBe("fuzzy");
    // one edit against the 18-character "heroes david bowie" key
    expect(result?.score).toBeCloseTo(94.444, 3);
  });
});
