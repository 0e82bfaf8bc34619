import type { ChartRenderer } from "./chart.js";
import { describeWindow, formatCoordinate } from "./format.js";
import type { Logger } from "./logging.js";
import type { WeatherProvider } from "./provider/weather-provider.js";
import type { ForecastRequest, ForecastResult, ForecastUnits, ModelSeries, Reply } from "./types.js";

export const PREVIEW_LINES = 20;

export interface ForecastOptions {
  maxMessageLength: number;
  chart: ChartRenderer;
  logger: Logger;
}

const formatValue = (value: number | null) => (value === null ? "-" : value.toFixed(1));

const fence = (text: string) => "```\n" + text + "\n```";

function renderBlock(series: ModelSeries, units: ForecastUnits): string {
  const headers = ["time", `temp ${units.temperature}`, `precip ${units.precipitation}`, `wind ${units.windSpeed}`];
  const rows = series.hours.map((h) => [
    h.time.slice(11, 16),
    formatValue(h.temperature),
    formatValue(h.precipitation),
    formatValue(h.windSpeed),
  ]);
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => row[col]?.length ?? 0)));
  const line = (cells: string[]) =>
    cells.map((cell, col) => (col === 0 ? cell.padEnd(widths[col] ?? 0) : cell.padStart(widths[col] ?? 0))).join("  ");

  return [series.model, line(headers), ...rows.map(line)].join("\n");
}

/** Plain-text table, one block per model, without the Markdown fence. */
export function renderForecast(result: ForecastResult): string {
  const { request } = result;
  const header = `Forecast for ${formatCoordinate(request.latitude)}, ${formatCoordinate(request.longitude)} on ${describeWindow(request)}`;
  return [header, ...result.series.map((series) => renderBlock(series, result.units))].join("\n\n");
}

export function renderCsv(result: ForecastResult): string {
  const cell = (value: number | null) => (value === null ? "" : String(value));
  const lines = ["time,model,temperature,precipitation,wind_speed"];
  for (const series of result.series) {
    for (const h of series.hours) {
      lines.push([h.time, series.model, cell(h.temperature), cell(h.precipitation), cell(h.windSpeed)].join(","));
    }
  }
  return lines.join("\n") + "\n";
}

export class ForecastOrchestrator {
  constructor(
    private readonly provider: WeatherProvider,
    private readonly options: ForecastOptions,
  ) {}

  public async run(request: ForecastRequest): Promise<Reply[]> {
    const result = await this.provider.fetchForecast(request);

    if (result.series.every((series) => series.hours.length === 0)) {
      return [{ kind: "text", text: `No forecast data for ${describeWindow(request)}.`, markdown: false }];
    }

    const replies = this.tables(result);
    const chart = this.chartReply(result);
    return chart === null ? replies : [...replies, chart];
  }

  private tables(result: ForecastResult): Reply[] {
    const text = renderForecast(result);
    const message = fence(text);
    if (message.length <= this.options.maxMessageLength) {
      return [{ kind: "text", text: message, markdown: true }];
    }

    const preview = text.split("\n").slice(0, PREVIEW_LINES).join("\n");
    return [
      { kind: "document", filename: `forecast-${result.request.date}.csv`, content: renderCsv(result), caption: "Forecast CSV" },
      { kind: "text", text: fence(preview), markdown: true },
    ];
  }

  /** Null when rendering fails; the tables are sent either way. */
  private chartReply(result: ForecastResult): Reply | null {
    try {
      const content = this.options.chart.render(result);
      return { kind: "photo", filename: `forecast-${result.request.date}.png`, content, caption: "Forecast chart" };
    } catch (error) {
      this.options.logger.warn("chart rendering failed", error);
      return null;
    }
  }
}
