import "./env.js";

import { program } from "commander";
import React from "react";
import { render } from "ink";
import { describeResult, log } from "@yesno/game";
import { App } from "./tui/App.js";
import { resolveConfig, setCliOverride, toSettings } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerAskCommand } from "./commands/ask.js";
import { GIF_PROMPT, MODE_LABELS, MODE_PROMPT, parseBool, parseMode } from "./modes.js";
import { createPrompter } from "./prompt.js";
import { createSession } from "./session.js";

interface PlayOptions {
  mode?: string;
  gifs?: boolean;
  seed?: string;
  offline?: boolean;
  oracleUrl?: string;
}

/** Prompt for whatever the flags left open */
async function askMissing(opts: PlayOptions): Promise<{ mode: string; gifs: boolean }> {
  if (opts.mode !== undefined && opts.gifs !== undefined) {
    return { mode: opts.mode, gifs: opts.gifs };
  }
  const prompter = createPrompter();
  try {
    const mode = opts.mode ?? (await prompter.ask(MODE_PROMPT));
    const gifs = opts.gifs ?? parseBool(await prompter.ask(GIF_PROMPT));
    return { mode, gifs };
  } finally {
    prompter.close();
  }
}

program
  .name("yesno-othello")
  .description("Othello where an oracle decides which colour you place")
  .version("0.1.0", "-v, --version");

registerConfigCommand(program);
registerAskCommand(program);

program
  .command("play", { isDefault: true })
  .description("Play a game in the terminal")
  .option("-m, --mode <mode>", "0: Human vs Human, 1: Random AI, 2: Greedy AI")
  .option("--gifs", "Show the oracle's answer popup each turn")
  .option("--no-gifs", "Skip the answer popup")
  .option("--seed <seed>", "Seed the random source for a repeatable game")
  .option("--offline", "Never call the oracle; answers are drawn at random")
  .option("--oracle-url <url>", "Oracle endpoint")
  .action(async (opts: PlayOptions) => {
    if (opts.oracleUrl) {
      setCliOverride("oracleUrl", opts.oracleUrl);
    }

    try {
      const settings = toSettings(await resolveConfig());
      const answers = await askMissing(opts);
      const session = createSession({
        mode: parseMode(answers.mode),
        showGifs: answers.gifs,
        offline: Boolean(opts.offline),
        seed: opts.seed,
        settings,
      });

      console.log(`Mode: ${MODE_LABELS[session.mode]}`);
      console.log(`Oracle: ${session.adapter ? settings.oracleUrl : "offline"}`);
      console.log("");

      const { waitUntilExit } = render(React.createElement(App, { session }));
      await waitUntilExit();

      const result = session.controller.result() ?? session.controller.close();
      console.log(describeResult(result));
      console.log(`YES: ${result.black}  NO: ${result.white}`);
    } catch (err) {
      log.error({ err }, "play failed");
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

await program.parseAsync();
