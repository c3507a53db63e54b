import { DEFAULT_ORACLE_URL } from "@yesno/game";

export interface ConfigData {
  /** Endpoint answering yes, no or maybe */
  oracleUrl: string;
  oracleTimeoutMs: string;
  /** Timeout for the companion animation download */
  gifTimeoutMs: string;
  aiDelayMinMs: string;
  aiDelayMaxMs: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "oracleUrl",
  "oracleTimeoutMs",
  "gifTimeoutMs",
  "aiDelayMinMs",
  "aiDelayMaxMs",
];

export const DEFAULTS: ConfigData = {
  oracleUrl: DEFAULT_ORACLE_URL,
  oracleTimeoutMs: "2000",
  gifTimeoutMs: "4000",
  aiDelayMinMs: "500",
  aiDelayMaxMs: "3000",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  oracleUrl: "ORACLE_URL",
  oracleTimeoutMs: "ORACLE_TIMEOUT_MS",
  gifTimeoutMs: "GIF_TIMEOUT_MS",
  aiDelayMinMs: "AI_DELAY_MIN_MS",
  aiDelayMaxMs: "AI_DELAY_MAX_MS",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
