import type { ForecastRequest, ForecastResult } from "../types.js";

export interface WeatherProvider {
  /**
   * Rejects with `InputError` when the provider refuses the parameters, and with
   * `ProviderError` when it cannot be reached or answers with unusable data.
   */
  fetchForecast(request: ForecastRequest): Promise<ForecastResult>;
}
