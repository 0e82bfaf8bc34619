import type { ForecastRequest } from "./types.js";

/** Compact coordinate: at most four decimals, no trailing zeros. */
export function formatCoordinate(value: number): string {
  return String(Number(value.toFixed(4)));
}

export const hourLabel = (hour: number) => `${String(hour).padStart(2, "0")}:00`;

export function describeWindow(request: ForecastRequest): string {
  return `${request.date} ${hourLabel(request.hourFrom)}–${hourLabel(request.hourTo)} (${request.timezone})`;
}
