import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

/** Defaults, then the config file, then the environment, then CLI flags */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fromFile = fileConfig[key];
    if (fromFile !== undefined && fromFile !== "") {
      resolved[key] = fromFile;
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const fromCli = cliOverrides[key];
    if (fromCli !== undefined && fromCli !== "") {
      resolved[key] = fromCli;
    }
  }

  return resolved;
}

export interface GameSettings {
  oracleUrl: string;
  oracleTimeoutMs: number;
  gifTimeoutMs: number;
  aiDelayMinMs: number;
  aiDelayMaxMs: number;
}

function parseMs(value: string, fallback: string): number {
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) || n < 0 ? Number.parseInt(fallback, 10) : n;
}

/** Numeric view of the config; bad values fall back to their defaults */
export function toSettings(config: ConfigData): GameSettings {
  const aiDelayMinMs = parseMs(config.aiDelayMinMs, DEFAULTS.aiDelayMinMs);
  const aiDelayMaxMs = parseMs(config.aiDelayMaxMs, DEFAULTS.aiDelayMaxMs);
  return {
    oracleUrl: config.oracleUrl,
    oracleTimeoutMs: parseMs(config.oracleTimeoutMs, DEFAULTS.oracleTimeoutMs),
    gifTimeoutMs: parseMs(config.gifTimeoutMs, DEFAULTS.gifTimeoutMs),
    aiDelayMinMs,
    aiDelayMaxMs: Math.max(aiDelayMinMs, aiDelayMaxMs),
  };
}
