#!/usr/bin/env tsx
import { parseArgs } from "node:util";
import { describeError } from "@keybot/core";
import { version } from "../package.json";
import { App } from "./app";
import { describeConfig, loadConfig } from "./config";
import { createReadlinePrompter } from "./prompter";
import { createTerminalReporter } from "./reporter";
import { NonInteractiveRunner } from "./runner";
import { t } from "./theme";

async function main() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      ask: { type: "string", short: "a" },
      knowledge: { type: "string", short: "k" },
      log: { type: "string" },
      list: { type: "boolean", short: "l" },
      config: { type: "boolean" },
      version: { type: "boolean", short: "v" },
    },
  });

  if (values.version) {
    console.log(`keybot ${version}`);
    return;
  }

  const oneShot = values.ask !== undefined || values.list === true || values.config === true;
  const reporter = createTerminalReporter({ quiet: oneShot });
  const config = await loadConfig(process.cwd(), { knowledgePath: values.knowledge, logPath: values.log }, reporter);

  if (values.config) {
    for (const line of describeConfig(config)) console.log(line);
    return;
  }

  if (values.list) {
    process.exit(new NonInteractiveRunner(config, { reporter }).list());
  }

  if (values.ask !== undefined) {
    const question = values.ask.trim();
    if (!question) {
      console.error("Error: --ask requires a non-empty string");
      process.exit(1);
    }
    const runner = new NonInteractiveRunner(config, { reporter, saveLogTo: values.log ? config.logPath : undefined });
    process.exit(runner.run(question));
  }

  const app = new App(config, { prompter: createReadlinePrompter(), reporter });
  await app.start();
}

main().catch((err) => {
  console.error(`${t.error}Error:${t.reset} ${describeError(err)}`);
  process.exit(1);
});
