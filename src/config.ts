import dotenv from "dotenv";
import path from "path";

dotenv.config();

export interface TutorConfig {
  port: number;
  dataDir: string;
  openai: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
  };
  scheduler: {
    interleaveEvery: number; // math drills between breaks
    weakAreaThreshold: number; // accuracy below this is weak
    weakAreaBias: number; // chance a drill targets a weak area
    weakAreaLimit: number;
  };
  bonusFactChance: number; // chance of a number fact after a correct drill
}

export const DEFAULT_CONFIG: TutorConfig = {
  port: 3001,
  dataDir: path.join(__dirname, "../data/sessions"),
  openai: {
    model: "gpt-4o-mini",
    timeoutMs: 20000,
    maxRetries: 1,
  },
  scheduler: {
    interleaveEvery: 3,
    weakAreaThreshold: 0.7,
    weakAreaBias: 0.7,
    weakAreaLimit: 3,
  },
  bonusFactChance: 0.3,
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    console.warn(`[Config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

const isPositiveInteger = (value: number) => Number.isInteger(value) && value >= 1;
const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;
const isProbability = (value: number) => value >= 0 && value <= 1;

/**
 * Build the runtime configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): TutorConfig {
  const defaults = DEFAULT_CONFIG;

  return {
    port: readNumber(env, "API_PORT", defaults.port, isPositiveInteger),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : defaults.dataDir,
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      model: env.OPENAI_MODEL || defaults.openai.model,
      timeoutMs: readNumber(env, "OPENAI_TIMEOUT_MS", defaults.openai.timeoutMs, isPositiveInteger),
      maxRetries: readNumber(env, "OPENAI_MAX_RETRIES", defaults.openai.maxRetries, isNonNegativeInteger),
    },
    scheduler: {
      interleaveEvery: readNumber(env, "INTERLEAVE_EVERY", defaults.scheduler.interleaveEvery, isPositiveInteger),
      weakAreaThreshold: readNumber(env, "WEAK_AREA_THRESHOLD", defaults.scheduler.weakAreaThreshold, isProbability),
      weakAreaBias: readNumber(env, "WEAK_AREA_BIAS", defaults.scheduler.weakAreaBias, isProbability),
      weakAreaLimit: readNumber(env, "WEAK_AREA_LIMIT", defaults.scheduler.weakAreaLimit, isPositiveInteger),
    },
    bonusFactChance: readNumber(env, "BONUS_FACT_CHANCE", defaults.bonusFactChance, isProbability),
  };
}
