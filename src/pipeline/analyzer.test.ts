import { describe, expect, it } from "vitest";
import { ProviderError } from "../lib/errors";
import { FakeLlm, TEST_MODELS, track } from "../test/fixtures";
import {
  analyzeRequest,
  buildAnalysisPrompt,
  mapGenresToLibrary,
  parseAnalysisResponse,
  toFilterSpec,
} from "./analyzer";
import { summarizeLibrary } from "./library";

const library = [
  track({ id: "1", genres: ["Rock", "Alternative"], year: 1985 }),
  track({ id: "2", genres: ["Rock"], year: 1992 }),
  track({ id: "3", genres: ["Hip-Hop"], year: 1994 }),
  track({ id: "4", genres: ["Electronic"], year: 2001 }),
];
const summary = summarizeLibrary(library);

const REPLY = JSON.stringify({
  genres: ["Rock", 5, null],
  decades: ["1990s"],
  min_rating: 0,
  exclude: ["live"],
  reasoning: "Guitars first",
  dimensions: [{ id: "mood", label: "Wistful" }, { id: "" }],
});

describe("parseAnalysisResponse", () => {
  it("keeps every field it can read", () => {
    const result = parseAnalysisResponse(REPLY);
    expect(result.kind).toBe("parsed");
    expect(result.value).toEqual({
      genres: ["Rock", "5"],
      decades: ["1990s"],
      min_rating: 0,
      exclude: ["live"],
      reasoning: "Guitars first",
      dimensions: [{ id: "mood", label: "Wistful", description: "" }],
    });
  });

  it("degrades on prose", () => {
    expect(parseAnalysisResponse("Sorry, I can't help with that.")).toEqual({
      kind: "degraded",
      value: {},
      reason: "reply contained no JSON",
    });
  });

  it("keeps readable fields and names the ones it dropped", () => {
    const result = parseAnalysisResponse('{"genres": ["Rock"], "min_rating": "high", "reasoning": null}');
    expect(result).toEqual({
      kind: "degraded",
      value: { genres: ["Rock"] },
      reason: "invalid fields: min_rating",
    });
  });

  it("degrades when every field has the wrong type", () => {
    expect(parseAnalysisResponse('{"genres": "Rock", "decades": 1990, "min_rating": "7"}')).toEqual({
      kind: "degraded",
      value: {},
      reason: "invalid fields: genres, decades, min_rating",
    });
  });

  it("degrades on an object with none of the expected fields", () => {
    expect(parseAnalysisResponse('{"foo": 1}')).toEqual({
      kind: "degraded",
      value: {},
      reason: "reply had none of the expected fields",
    });
  });

  it("degrades on JSON that is not an object", () => {
    expect(parseAnalysisResponse('["Rock"]')).toEqual({
      kind: "degraded",
      value: {},
      reason: "reply was not a JSON object",
    });
  });
});

describe("mapGenresToLibrary", () => {
  it("maps suggestions onto library genre names", () => {
    const genres = summary.genres.map((genre) => genre.name);
    expect(mapGenresToLibrary(["rock", "hip hop", "Shoegaze", "Electronica", "ROCK"], genres)).toEqual([
      "Rock",
      "Hip-Hop",
      "Electronic",
    ]);
  });
});

describe("toFilterSpec", () => {
  it("turns a reply into library-grounded filters", () => {
    const result = parseAnalysisResponse(REPLY);
    expect(toFilterSpec(result.value, summary)).toEqual({
      genres: ["Rock"],
      decades: { from: 1990, to: 1990 },
      exclude: { substrings: ["live"] },
    });
  });

  it("imposes nothing for an empty reply", () => {
    expect(toFilterSpec({}, summary)).toEqual({});
  });
});

describe("buildAnalysisPrompt", () => {
  it("sends the library summary, never the tracks", () => {
    expect(buildAnalysisPrompt({ prompt: "rainy day indie" }, summary)).toBe(
      [
        "Library: 4 tracks, released 1985-2001",
        "Genres: Rock (2), Alternative (1), Electronic (1), Hip-Hop (1)",
        "Decades: 1980s (1), 1990s (2), 2000s (1)",
        "",
        "Playlist request: rainy day indie",
      ].join("\n")
    );
  });

  it("describes a seed track and asks for dimensions", () => {
    const seed = track({
      id: "7",
      title: "Heroes",
      artist: "David Bowie",
      album: "Heroes",
      year: 1977,
      genres: ["Rock"],
    });
    const prompt = buildAnalysisPrompt({ seed }, summary);
    expect(prompt).toContain("Seed track: Heroes by David Bowie (from Heroes, 1977; genres: Rock)");
    expect(prompt).toContain("Describe 4-6 specific dimensions of the seed track");
  });
});

describe("analyzeRequest", () => {
  it("makes one analysis-model call", async () => {
    const llm = new FakeLlm([REPLY]);
    const analysis = await analyzeRequest({ prompt: "90s rock" }, summary, {
      llm,
      models: TEST_MODELS,
    });

    expect(llm.requests).toHaveLength(1);
    expect(llm.requests[0]?.model).toBe("claude-sonnet-4-5");
    expect(llm.requests[0]?.maxTokens).toBe(1024);
    expect(analysis).toEqual({
      filters: {
        genres: ["Rock"],
        decades: { from: 1990, to: 1990 },
        exclude: { substrings: ["live"] },
      },
      hints: {
        reasoning: "Guitars first",
        dimensions: [{ id: "mood", label: "Wistful", description: "" }],
      },
      status: "parsed",
      usage: { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
      model: "claude-sonnet-4-5",
    });
  });

  it("falls back to no filters when the reply is unreadable", async () => {
    const llm = new FakeLlm(["I think you would enjoy some rock."]);
    const analysis = await analyzeRequest({ prompt: "rock" }, summary, {
      llm,
      models: TEST_MODELS,
    });
    expect(analysis.status).toBe("degraded");
    expect(analysis.filters).toEqual({});
    expect(analysis.hints).toEqual({ reasoning: null, dimensions: [] });
  });

  it("keeps the readable filters of a partly malformed reply", async () => {
    const llm = new FakeLlm(['{"genres": ["rock"], "min_rating": "high"}']);
    const analysis = await analyzeRequest({ prompt: "rock" }, summary, {
      llm,
      models: TEST_MODELS,
    });
    expect(analysis.status).toBe("degraded");
    expect(analysis.filters).toEqual({ genres: ["Rock"] });
  });

  it("retries a retryable provider failure once", async () => {
    const llm = new FakeLlm([new ProviderError("overloaded", { retryable: true, status: 529 }), '{"genres": []}']);
    const analysis = await analyzeRequest({ prompt: "rock" }, summary, {
      llm,
      models: TEST_MODELS,
      retryDelayMs: 0,
    });
    expect(llm.requests).toHaveLength(2);
    expect(analysis.status).toBe("parsed");
  });

  it("surfaces a non-retryable provider failure", async () => {
    const llm = new FakeLlm([new ProviderError("bad key", { retryable: false, status: 401 })]);
    await expect(
      analyzeRequest({ prompt: "rock" }, summary, { llm, models: TEST_MODELS, retryDelayMs: 0 })
    ).rejects.toThrow("bad key");
    expect(llm.requests).toHaveLength(1);
  });

  it("needs a prompt or a seed", async () => {
    await expect(
      analyzeRequest({}, summary, { llm: new FakeLlm([]), models: TEST_MODELS })
    ).rejects.toThrow("Analysis needs a prompt or a seed track.");
  });
});
