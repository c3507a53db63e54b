import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  isConfigKey,
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  ConfigData,
} from "../config/index.js";
import { createPrompter } from "../prompt.js";

const PROMPTS: Record<keyof ConfigData, string> = {
  oracleUrl: "Oracle URL",
  oracleTimeoutMs: "Oracle timeout (ms)",
  gifTimeoutMs: "GIF timeout (ms)",
  aiDelayMinMs: "AI thinking delay min (ms)",
  aiDelayMaxMs: "AI thinking delay max (ms)",
};

function unknownKey(key: string): never {
  console.error(
    `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
  );
  process.exit(1);
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage configuration (~/.yesno-othello/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) unknownKey(key);
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) unknownKey(key);
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const prompter = createPrompter();

  console.log("\nYes/No Othello Configuration");
  console.log("────────────────────────────\n");

  try {
    const data: Partial<ConfigData> = { ...existing };
    for (const key of CONFIG_KEYS) {
      const current = existing[key] || DEFAULTS[key];
      const answer = await prompter.ask(`${PROMPTS[key]} [${current}]: `);
      data[key] = answer.trim() || current;
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${resolved[key]}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  console.log("");
}

function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
