import { z } from "zod";
import { InputError, ProviderError } from "../errors.js";
import type { Logger } from "../logging.js";
import { providerKey, type ModelId } from "../models.js";
import type { ForecastRequest, ForecastResult, ForecastUnits, HourlyValues } from "../types.js";
import type { WeatherProvider } from "./weather-provider.js";

export const OPEN_METEO_URL = "https://api.open-meteo.com/v1/forecast";

const HOURLY_VARIABLES = {
  temperature: "temperature_2m",
  precipitation: "precipitation",
  windSpeed: "wind_speed_10m",
} as const;

const DEFAULT_UNITS: ForecastUnits = { temperature: "°C", precipitation: "mm", windSpeed: "km/h" };

const OpenMeteoResponseSchema = z.object({
  timezone: z.string().optional(),
  hourly_units: z.record(z.string()).optional(),
  hourly: z
    .object({
      time: z.array(z.string()),
    })
    .catchall(z.array(z.number().nullable())),
});

export type OpenMeteoResponse = z.infer<typeof OpenMeteoResponseSchema>;

const OpenMeteoErrorSchema = z.object({ error: z.literal(true), reason: z.string() });

export interface OpenMeteoOptions {
  baseUrl?: string;
  timeoutMs?: number;
  logger: Logger;
}

export class OpenMeteoProvider implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: OpenMeteoOptions) {
    this.baseUrl = options.baseUrl ?? OPEN_METEO_URL;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger;
  }

  public async fetchForecast(request: ForecastRequest): Promise<ForecastResult> {
    const url = this.buildUrl(request);
    this.logger.debug(`Fetching forecast from: ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new ProviderError(`Open-Meteo did not answer within ${this.timeoutMs} ms`, { cause: error });
      }
      throw new ProviderError("Open-Meteo request failed", { cause: error });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(`Open-Meteo API error: HTTP ${response.status}, body is not JSON`, { cause: error });
    }

    if (!response.ok) {
      const apiError = OpenMeteoErrorSchema.safeParse(body);
      // 400 with a reason means the parameters themselves were refused (e.g. a date out of range).
      if (response.status === 400 && apiError.success) {
        throw new InputError("request", undefined, `The weather provider rejected the request: ${apiError.data.reason}`);
      }
      const reason = apiError.success ? `: ${apiError.data.reason}` : "";
      throw new ProviderError(`Open-Meteo API error: HTTP ${response.status}${reason}`);
    }

    const parsed = OpenMeteoResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected Open-Meteo response: ${parsed.error.message}`, { cause: parsed.error });
    }
    return toForecastResult(request, parsed.data);
  }

  private buildUrl(request: ForecastRequest): string {
    const params = new URLSearchParams({
      latitude: request.latitude.toString(),
      longitude: request.longitude.toString(),
      hourly: Object.values(HOURLY_VARIABLES).join(","),
      timezone: request.timezone,
      start_date: request.date,
      end_date: request.date,
      models: request.models.map(providerKey).join(","),
    });

    return `${this.baseUrl}?${params.toString()}`;
  }
}

/**
 * With several models Open-Meteo suffixes each hourly key with `_<model key>`;
 * with a single model the keys are plain.
 */
function seriesFor(
  data: OpenMeteoResponse,
  variable: string,
  model: ModelId,
  single: boolean,
): (number | null)[] {
  const suffixed = data.hourly[`${variable}_${providerKey(model)}`];
  const series = suffixed ?? (single ? data.hourly[variable] : undefined);
  if (series === undefined) {
    throw new ProviderError(`Open-Meteo response has no ${variable} data for model ${model}`);
  }
  return series;
}

export function toForecastResult(request: ForecastRequest, data: OpenMeteoResponse): ForecastResult {
  const single = request.models.length === 1;
  const units = data.hourly_units ?? {};

  const series = request.models.map((model) => {
    const temperature = seriesFor(data, HOURLY_VARIABLES.temperature, model, single);
    const precipitation = seriesFor(data, HOURLY_VARIABLES.precipitation, model, single);
    const windSpeed = seriesFor(data, HOURLY_VARIABLES.windSpeed, model, single);

    const hours: HourlyValues[] = [];
    data.hourly.time.forEach((time, i) => {
      const hour = Number(time.slice(11, 13));
      if (time.slice(0, 10) !== request.date || hour < request.hourFrom || hour > request.hourTo) return;
      hours.push({
        time,
        hour,
        temperature: temperature[i] ?? null,
        precipitation: precipitation[i] ?? null,
        windSpeed: windSpeed[i] ?? null,
      });
    });

    return { model, hours };
  });

  return {
    request,
    units: {
      temperature: unitFor(units, HOURLY_VARIABLES.temperature, request.models, single) ?? DEFAULT_UNITS.temperature,
      precipitation: unitFor(units, HOURLY_VARIABLES.precipitation, request.models, single) ?? DEFAULT_UNITS.precipitation,
      windSpeed: unitFor(units, HOURLY_VARIABLES.windSpeed, request.models, single) ?? DEFAULT_UNITS.windSpeed,
    },
    series,
  };
}

function unitFor(
  units: Record<string, string>,
  variable: string,
  models: readonly ModelId[],
  single: boolean,
): string | undefined {
  for (const model of models) {
    const unit = units[`${variable}_${providerKey(model)}`];
    if (unit !== undefined) return unit;
  }
  return single ? units[variable] : undefined;
}
