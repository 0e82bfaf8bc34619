import { forecastTemplate, MODELS_TEXT, parseCommand, parseForecastArgs, START_TEXT, USAGE } from "./commands.js";
import { InputError, ProviderError } from "./errors.js";
import type { ForecastOrchestrator } from "./forecast.js";
import type { Logger } from "./logging.js";
import type { Reply } from "./types.js";

export const PROVIDER_ERROR_TEXT = "Weather provider is unavailable right now. Please try again later.";
export const INTERNAL_ERROR_TEXT = "Something went wrong while preparing the forecast.";

const text = (body: string): Reply => ({ kind: "text", text: body, markdown: false });

/**
 * Routes a chat message to its command. Every failure ends up as a reply;
 * `handle` never rejects.
 */
export class CommandDispatcher {
  constructor(
    private readonly orchestrator: ForecastOrchestrator,
    private readonly logger: Logger,
  ) {}

  public async handle(message: string): Promise<Reply[]> {
    const command = parseCommand(message);
    if (command === null) return [];

    this.logger.debug(`/${command.name}`, { args: command.args });
    switch (command.name) {
      case "start":
      case "help":
        return [text(START_TEXT)];
      case "models":
        return [text(MODELS_TEXT)];
      case "forecast":
        return this.forecast(command.args);
      default:
        return [text(`Unknown command /${command.name}.\n${USAGE}\nSee /models`)];
    }
  }

  public handleLocation(latitude: number, longitude: number): Reply[] {
    return [text(`Fill in the rest and send it back:\n${forecastTemplate(latitude, longitude)}`)];
  }

  private async forecast(args: string[]): Promise<Reply[]> {
    try {
      const request = parseForecastArgs(args);
      return await this.orchestrator.run(request);
    } catch (error) {
      if (error instanceof InputError) {
        return [text(error.message)];
      }
      if (error instanceof ProviderError) {
        this.logger.warn("forecast provider failure", error.message, error.cause);
        return [text(PROVIDER_ERROR_TEXT)];
      }
      this.logger.error("forecast error", error);
      return [text(INTERNAL_ERROR_TEXT)];
    }
  }
}
