import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import { InputError } from "./errors.js";
import { formatCoordinate } from "./format.js";
import { findModel, MODEL_IDS, type ModelId } from "./models.js";
import type { ForecastRequest } from "./types.js";

dayjs.extend(customParseFormat);

export const FORECAST_ARGS = "<lat> <lon> <timezone> <YYYY-MM-DD> <start_hr> <end_hr> <models>";
export const USAGE = `Usage: /forecast ${FORECAST_ARGS}`;

export const START_TEXT = [
  "🌤 Welcome!",
  "Use:",
  `/forecast ${FORECAST_ARGS}`,
  "Example:",
  "/forecast 22.26 69.40 Asia/Kolkata 2025-08-19 12 18 GFS,ICON",
  "See /models, or send me a location to get a ready-made command.",
].join("\n");

export const MODELS_TEXT = `Supported models: ${MODEL_IDS.join(", ")}`;

export interface ParsedCommand {
  /** Lowercased, without the leading slash or an @botname suffix */
  name: string;
  args: string[];
}

export function parseCommand(text: string): ParsedCommand | null {
  const tokens = text.trim().split(/\s+/);
  const head = tokens[0] ?? "";
  if (!head.startsWith("/") || head.length < 2) return null;

  const [name = ""] = head.slice(1).split("@");
  return { name: name.toLowerCase(), args: tokens.slice(1) };
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const HOUR = /^\d{1,2}$/;

function parseCoordinate(field: string, value: string, limit: number): number {
  const n = DECIMAL.test(value) ? Number(value) : NaN;
  if (!Number.isFinite(n) || Math.abs(n) > limit) {
    throw new InputError(field, value, `Invalid ${field} "${value}": expected a number between -${limit} and ${limit}.`);
  }
  return n;
}

let zoneSpellings: Map<string, string> | undefined;

/** Lowercased name to canonical spelling for every zone Intl lists. */
function listedZones(): Map<string, string> {
  if (zoneSpellings === undefined) {
    zoneSpellings = new Map(Intl.supportedValuesOf("timeZone").map((zone) => [zone.toLowerCase(), zone]));
  }
  return zoneSpellings;
}

function isKnownZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

function parseTimezone(value: string): string {
  const listed = listedZones().get(value.toLowerCase());
  if (listed !== undefined) return listed;

  // Links such as Asia/Kolkata or US/Eastern resolve in Intl without being listed;
  // they are taken only in their IANA spelling, each segment capitalized.
  if (isKnownZone(value) && value.split("/").every((segment) => /^[A-Z]/.test(segment))) return value;

  throw new InputError("timezone", value, `Invalid timezone "${value}": expected an IANA name such as Europe/Berlin.`);
}

function parseDate(value: string): string {
  if (!dayjs(value, "YYYY-MM-DD", true).isValid()) {
    throw new InputError("date", value, `Invalid date "${value}": expected a calendar date as YYYY-MM-DD.`);
  }
  return value;
}

function parseHour(field: string, label: string, value: string): number {
  const n = HOUR.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(n) || n > 23) {
    throw new InputError(field, value, `Invalid ${label} "${value}": expected an integer from 0 to 23.`);
  }
  return n;
}

function parseModels(value: string): ModelId[] {
  const names = value.split(",").map((name) => name.trim()).filter((name) => name.length > 0);
  if (names.length === 0) {
    throw new InputError("models", value, "No models given. Use /models to see the supported ones.");
  }

  const unknown = names.filter((name) => findModel(name) === undefined);
  if (unknown.length > 0) {
    const quoted = unknown.map((name) => `"${name}"`).join(", ");
    const noun = unknown.length === 1 ? "model" : "models";
    throw new InputError("models", value, `Unknown ${noun} ${quoted}. Use /models to see the supported ones.`);
  }

  const models: ModelId[] = [];
  for (const name of names) {
    const model = findModel(name);
    if (model !== undefined && !models.includes(model)) models.push(model);
  }
  return models;
}

/** Validates the seven `/forecast` arguments in order; the first failing field throws an `InputError`. */
export function parseForecastArgs(args: readonly string[]): ForecastRequest {
  const [lat, lon, tz, date, from, to, models] = args;
  if (
    args.length !== 7 ||
    lat === undefined ||
    lon === undefined ||
    tz === undefined ||
    date === undefined ||
    from === undefined ||
    to === undefined ||
    models === undefined
  ) {
    throw new InputError("arguments", args.join(" "), `Expected 7 arguments, got ${args.length}.\n${USAGE}`);
  }

  const latitude = parseCoordinate("latitude", lat, 90);
  const longitude = parseCoordinate("longitude", lon, 180);
  const timezone = parseTimezone(tz);
  const day = parseDate(date);
  const hourFrom = parseHour("hour_from", "start hour", from);
  const hourTo = parseHour("hour_to", "end hour", to);
  if (hourTo < hourFrom) {
    throw new InputError("hour_to", to, `Invalid end hour "${to}": must not be before start hour ${hourFrom}.`);
  }

  return Object.freeze({
    latitude,
    longitude,
    timezone,
    date: day,
    hourFrom,
    hourTo,
    models: Object.freeze(parseModels(models)),
  });
}

export function forecastTemplate(latitude: number, longitude: number): string {
  return `/forecast ${formatCoordinate(latitude)} ${formatCoordinate(longitude)} <timezone> <YYYY-MM-DD> <start_hr> <end_hr> <models>`;
}
