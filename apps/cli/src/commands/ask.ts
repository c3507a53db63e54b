import { Command } from "commander";
import { OracleAdapter, createRandom } from "@yesno/game";
import { resolveConfig, toSettings } from "../config/index.js";

interface AskOptions {
  seed?: string;
  gif?: boolean;
}

export function registerAskCommand(program: Command): void {
  program
    .command("ask")
    .description("Ask the oracle once and print the answer")
    .option("--seed <seed>", "Seed for the fallback answer")
    .option("--gif", "Also download the animation and print its size")
    .action(async (opts: AskOptions) => {
      const settings = toSettings(await resolveConfig());
      const adapter = new OracleAdapter({
        url: settings.oracleUrl,
        timeoutMs: settings.oracleTimeoutMs,
        animationTimeoutMs: settings.gifTimeoutMs,
        rng: createRandom(opts.seed),
      });

      const reading = await adapter.fetchAnswer();
      console.log(`${reading.answer.toUpperCase()} (${reading.source})`);

      if (opts.gif) {
        const animation = await adapter.fetchAnimation(reading.imageUrl);
        console.log(
          animation
            ? `${animation.url} ${animation.width}x${animation.height}, ${animation.byteLength} bytes`
            : "No animation",
        );
      }
    });
}
