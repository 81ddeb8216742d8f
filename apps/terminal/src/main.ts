import { emitKeypressEvents } from "node:readline";
import { TestEngine } from "@numdrill/engine";
import { storage } from "@numdrill/storage";
import { NumdrillApp, formatSummary, Keypress } from "./app";
import { USAGE, parseCliArgs, resolveConfig } from "./config";

async function main() {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  // Defaults < stored settings < flags
  const stored = await storage.loadConfig();
  const config = resolveConfig(stored, cli.overrides);

  if (cli.save) {
    await storage.saveConfig(config);
    console.log(`[Config] Saved settings to ${storage.configPath}`);
  }

  const { stdin, stdout } = process;
  if (!stdin.isTTY) {
    throw new Error("numdrill needs an interactive terminal");
  }

  const engine = new TestEngine(config);
  const app = new NumdrillApp(engine, stdout, {
    onExit: (stats) => {
      stdin.setRawMode(false);
      stdin.pause();
      console.log(formatSummary(stats));
    },
  });

  emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  stdin.on("keypress", (str: string | undefined, key: Keypress | undefined) => {
    app.handleKeypress(str, key);
  });
  stdout.on("resize", () => app.redraw());

  app.run();
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error starting application: ${message}`);
  process.exitCode = 1;
});
