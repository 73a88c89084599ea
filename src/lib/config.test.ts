import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { loadConfig, modelSettings, requireLlmCredentials, requirePlexCredentials } from "./config";
import { ConfigError } from "./errors";

let dir: string;
let configPath: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "tunesmith-config-"));
  configPath = path.join(dir, "config.yaml");
  fs.writeFileSync(
    configPath,
    [
      "plex:",
      "  url: http://plex.local:32400",
      "  token: test-token",
      "  music_library: Tunes",
      "llm:",
      "  provider: openai",
      "  api_key: test-secret",
      '  smart_generation: "yes"',
      "  context_limit: 64000",
      "defaults:",
      "  track_count: 40",
      "  exclude_live: false",
      "",
    ].join("\n")
  );
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("reads the YAML file and fills in defaults", () => {
    expect(loadConfig({ TUNESMITH_CONFIG_PATH: configPath })).toEqual({
      plex: { url: "http://plex.local:32400", token: "test-token", music_library: "Tunes" },
      llm: {
        provider: "openai",
        api_key: "test-secret",
        model_analysis: "gpt-4.1",
        model_generation: "gpt-4.1-mini",
        smart_generation: true,
        context_limit: 64000,
      },
      defaults: { track_count: 40, exclude_live: false, max_tracks_to_ai: 500, min_rating: 0 },
    });
  });

  it("lets environment variables override the file", () => {
    const config = loadConfig({
      TUNESMITH_CONFIG_PATH: configPath,
      PLEX_URL: "http://other:32400",
      LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-anthropic",
      LLM_MODEL_GENERATION: "claude-3-5-haiku-latest",
    });
    expect(config.plex.url).toBe("http://other:32400");
    expect(config.llm).toMatchObject({
      provider: "anthropic",
      api_key: "test-anthropic",
      model_analysis: "claude-sonnet-4-5",
      model_generation: "claude-3-5-haiku-latest",
    });
  });

  it("uses defaults when there is no config file", () => {
    const config = loadConfig({ TUNESMITH_CONFIG_PATH: path.join(dir, "missing.yaml") });
    expect(config.plex).toEqual({ url: "http://localhost:32400", token: "", music_library: "Music" });
    expect(config.llm.provider).toBe("anthropic");
    expect(config.defaults).toEqual({
      track_count: 25,
      exclude_live: true,
      max_tracks_to_ai: 500,
      min_rating: 0,
    });
  });

  it("rejects an unknown provider", () => {
    expect(() =>
      loadConfig({ TUNESMITH_CONFIG_PATH: configPath, LLM_PROVIDER: "parrot" })
    ).toThrow(ConfigError);
  });
});

describe("credentials", () => {
  it("requires a Plex token and an API key", () => {
    const config = loadConfig({ TUNESMITH_CONFIG_PATH: path.join(dir, "missing.yaml") });
    expect(() => requirePlexCredentials(config)).toThrow(ConfigError);
    expect(() => requireLlmCredentials(config)).toThrow("No API key for anthropic.");
  });
});

describe("modelSettings", () => {
  it("threads both models and the smart flag", () => {
    expect(modelSettings(loadConfig({ TUNESMITH_CONFIG_PATH: configPath }))).toEqual({
      analysisModel: "gpt-4.1",
      generationModel: "gpt-4.1-mini",
      smartGeneration: true,
    });
  });
});
