import type { ModelId } from "./models.js";

export interface ForecastRequest {
  readonly latitude: number;
  readonly longitude: number;
  /** IANA timezone name */
  readonly timezone: string;
  /** YYYY-MM-DD */
  readonly date: string;
  readonly hourFrom: number;
  readonly hourTo: number;
  readonly models: readonly ModelId[];
}

export interface HourlyValues {
  /** Local time as returned by the provider, e.g. 2025-08-19T12:00 */
  time: string;
  hour: number;
  temperature: number | null;
  precipitation: number | null;
  windSpeed: number | null;
}

export interface ModelSeries {
  model: ModelId;
  hours: HourlyValues[];
}

export interface ForecastUnits {
  temperature: string;
  precipitation: string;
  windSpeed: string;
}

export interface ForecastResult {
  request: ForecastRequest;
  units: ForecastUnits;
  series: ModelSeries[];
}

export type Reply =
  | { kind: "text"; text: string; markdown: boolean }
  | { kind: "document"; filename: string; content: string; caption: string }
  | { kind: "photo"; filename: string; content: Buffer; caption: string };
