import fs from "fs";
import yaml from "yaml";
import { ConfigError } from "./errors";
import { defaultConfigPath, expandHome } from "./paths";

export type LlmProviderName = "anthropic" | "openai";

export type AppConfig = {
  plex: {
    url: string;
    token: string;
    music_library: string;
  };
  llm: {
    provider: LlmProviderName;
    api_key: string;
    model_analysis: string;
    model_generation: string;
    smart_generation: boolean;
    context_limit: number;
  };
  defaults: {
    track_count: number;
    exclude_live: boolean;
    max_tracks_to_ai: number;
    min_rating: number;
  };
};

/**
 * The two-model setup handed explicitly to the analyzer and generator.
 */
export type ModelSettings = {
  analysisModel: string;
  generationModel: string;
  smartGeneration: boolean;
};

type PartialConfig = {
  plex?: Partial<AppConfig["plex"]>;
  llm?: Partial<AppConfig["llm"]>;
  defaults?: Partial<AppConfig["defaults"]>;
};

const DEFAULT_MODELS: Record<LlmProviderName, { analysis: string; generation: string }> = {
  anthropic: { analysis: "claude-sonnet-4-5", generation: "claude-haiku-4-5" },
  openai: { analysis: "gpt-4.1", generation: "gpt-4.1-mini" },
};

const DEFAULT_CONFIG: AppConfig = {
  plex: {
    url: "http://localhost:32400",
    token: "",
    music_library: "Music",
  },
  llm: {
    provider: "anthropic",
    api_key: "",
    model_analysis: DEFAULT_MODELS.anthropic.analysis,
    model_generation: DEFAULT_MODELS.anthropic.generation,
    smart_generation: false,
    context_limit: 0,
  },
  defaults: {
    track_count: 25,
    exclude_live: true,
    max_tracks_to_ai: 500,
    min_rating: 0,
  },
};

function normalizeProvider(value: unknown): LlmProviderName {
  if (value == null || value === "") return DEFAULT_CONFIG.llm.provider;
  const normalized = String(value).toLowerCase();
  if (normalized === "anthropic" || normalized === "openai") {
    return normalized;
  }
  throw new ConfigError(`Unsupported llm.provider "${String(value)}". Use anthropic or openai.`);
}

function coerceNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function coerceBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  }
  return fallback;
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, "utf8");
  const parsed: unknown = yaml.parse(raw);
  if (parsed && typeof parsed === "object") {
    return parsed as PartialConfig;
  }
  return {};
}

function apiKeyFromEnv(
  env: NodeJS.ProcessEnv,
  provider: LlmProviderName
): string | undefined {
  if (env.LLM_API_KEY) return env.LLM_API_KEY;
  return provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = expandHome(env.TUNESMITH_CONFIG_PATH ?? defaultConfigPath());
  const fileConfig = readConfigFile(configPath);

  const provider = normalizeProvider(env.LLM_PROVIDER ?? fileConfig.llm?.provider);
  const models = DEFAULT_MODELS[provider];

  return {
    plex: {
      url: env.PLEX_URL ?? fileConfig.plex?.url ?? DEFAULT_CONFIG.plex.url,
      token: env.PLEX_TOKEN ?? fileConfig.plex?.token ?? DEFAULT_CONFIG.plex.token,
      music_library:
        env.PLEX_MUSIC_LIBRARY ??
        fileConfig.plex?.music_library ??
        DEFAULT_CONFIG.plex.music_library,
    },
    llm: {
      provider,
      api_key: apiKeyFromEnv(env, provider) ?? fileConfig.llm?.api_key ?? DEFAULT_CONFIG.llm.api_key,
      model_analysis:
        env.LLM_MODEL_ANALYSIS ?? fileConfig.llm?.model_analysis ?? models.analysis,
      model_generation:
        env.LLM_MODEL_GENERATION ?? fileConfig.llm?.model_generation ?? models.generation,
      smart_generation: coerceBoolean(
        fileConfig.llm?.smart_generation,
        DEFAULT_CONFIG.llm.smart_generation
      ),
      context_limit: coerceNumber(fileConfig.llm?.context_limit, DEFAULT_CONFIG.llm.context_limit),
    },
    defaults: {
      track_count: coerceNumber(
        fileConfig.defaults?.track_count,
        DEFAULT_CONFIG.defaults.track_count
      ),
      exclude_live: coerceBoolean(
        fileConfig.defaults?.exclude_live,
        DEFAULT_CONFIG.defaults.exclude_live
      ),
      max_tracks_to_ai: coerceNumber(
        fileConfig.defaults?.max_tracks_to_ai,
        DEFAULT_CONFIG.defaults.max_tracks_to_ai
      ),
      min_rating: coerceNumber(
        fileConfig.defaults?.min_rating,
        DEFAULT_CONFIG.defaults.min_rating
      ),
    },
  };
}

export function modelSettings(config: AppConfig): ModelSettings {
  return {
    analysisModel: config.llm.model_analysis,
    generationModel: config.llm.model_generation,
    smartGeneration: config.llm.smart_generation,
  };
}

export function requirePlexCredentials(config: AppConfig): void {
  if (!config.plex.url || !config.plex.token) {
    throw new ConfigError("Plex is not configured. Set plex.url and plex.token (or PLEX_URL/PLEX_TOKEN).");
  }
}

export function requireLlmCredentials(config: AppConfig): void {
  if (!config.llm.api_key) {
    throw new ConfigError(
      `No API key for ${config.llm.provider}. Set llm.api_key (or LLM_API_KEY).`
    );
  }
}
