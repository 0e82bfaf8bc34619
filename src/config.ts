import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logging.js";

export interface BotConfig {
  botToken: string;
  openMeteoUrl: string;
  requestTimeoutMs: number;
  maxMessageLength: number;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  BOT_TOKEN: z.string({ required_error: "BOT_TOKEN env var not set" }).trim().min(1, "BOT_TOKEN env var not set"),
  OPEN_METEO_URL: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_MESSAGE_LENGTH: z.coerce.number().int().min(200).max(4096).default(3800),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return issue.message.includes(path) ? issue.message : `${path}: ${issue.message}`;
      }),
    );
  }

  const e = parsed.data;
  return Object.freeze({
    botToken: e.BOT_TOKEN,
    openMeteoUrl: e.OPEN_METEO_URL,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxMessageLength: e.MAX_MESSAGE_LENGTH,
    logLevel: e.LOG_LEVEL,
  });
}
