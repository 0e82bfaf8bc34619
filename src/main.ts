import "dotenv/config";
import { createBot } from "./bot.js";
import { ForecastChart } from "./chart.js";
import { loadConfig } from "./config.js";
import { CommandDispatcher } from "./dispatcher.js";
import { ConfigError } from "./errors.js";
import { ForecastOrchestrator } from "./forecast.js";
import { createLogger } from "./logging.js";
import { OpenMeteoProvider } from "./provider/open-meteo.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger("main", config.logLevel);

  const provider = new OpenMeteoProvider({
    baseUrl: config.openMeteoUrl,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child("open-meteo"),
  });
  const orchestrator = new ForecastOrchestrator(provider, {
    maxMessageLength: config.maxMessageLength,
    chart: new ForecastChart(),
    logger: logger.child("forecast"),
  });
  const dispatcher = new CommandDispatcher(orchestrator, logger.child("dispatcher"));
  const bot = createBot(config.botToken, dispatcher, logger.child("bot"));

  bot
    .launch(() => logger.info("Bot is polling for updates"))
    .catch((error: unknown) => {
      logger.error("Bot stopped unexpectedly", error);
      process.exitCode = 1;
    });

  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));
}

try {
  main();
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  createLogger("main").error(error.message);
  process.exitCode = 1;
}
