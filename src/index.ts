#!/usr/bin/env node
import { loadConfig } from "./config/config.js";
import { LaunchTrader } from "./bots/launchTrader.js";
import { ValidationError, errorMessage } from "./core/errors.js";

const EXIT_INVALID_CONFIG = 2;

const main = async (): Promise<void> => {
  let trader: LaunchTrader;
  try {
    trader = new LaunchTrader(loadConfig(process.env.CONFIG_PATH));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      process.exitCode = EXIT_INVALID_CONFIG;
      return;
    }
    throw error;
  }

  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  process.exitCode = await trader.run(controller.signal);
  process.off("SIGINT", stop);
  process.off("SIGTERM", stop);
};

main().catch((error: unknown) => {
  console.error(JSON.stringify({ ts: new Date().toISOString(), level: "error", event: "fatal", error: errorMessage(error) }));
  process.exitCode = 1;
});
