import { describe, it, expect } from "vitest";
import { buildChartOption, ForecastChart } from "./chart.js";
import type { ForecastResult } from "./types.js";

const RESULT: ForecastResult = {
  request: {
    latitude: 22.26,
    longitude: 69.4,
    timezone: "Asia/Kolkata",
    date: "2025-08-19",
    hourFrom: 12,
    hourTo: 13,
    models: ["GFS", "ICON"],
  },
  units: { temperature: "°C", precipitation: "mm", windSpeed: "km/h" },
  series: [
    {
      model: "GFS",
      hours: [
        { time: "2025-08-19T12:00", hour: 12, temperature: 31.2, precipitation: 0, windSpeed: 14.3 },
        { time: "2025-08-19T13:00", hour: 13, temperature: 30, precipitation: 1.25, windSpeed: 15 },
      ],
    },
    {
      model: "ICON",
      hours: [
        { time: "2025-08-19T12:00", hour: 12, temperature: 30.5, precipitation: null, windSpeed: 12 },
        { time: "2025-08-19T13:00", hour: 13, temperature: 29.8, precipitation: 0.4, windSpeed: null },
      ],
    },
  ],
};

describe("buildChartOption", () => {
  it("draws one line per model in each of the three panels", () => {
    const option = buildChartOption(RESULT);

    expect(option.xAxis).toEqual([
      { type: "category", gridIndex: 0, data: ["12:00", "13:00"], boundaryGap: false },
      { type: "category", gridIndex: 1, data: ["12:00", "13:00"], boundaryGap: false },
      { type: "category", gridIndex: 2, data: ["12:00", "13:00"], boundaryGap: false },
    ]);
    expect(option.legend).toMatchObject({ data: ["GFS", "ICON"] });
    expect(option.series).toMatchObject([
      { name: "GFS", xAxisIndex: 0, data: [31.2, 30] },
      { name: "ICON", xAxisIndex: 0, data: [30.5, 29.8] },
      { name: "GFS", xAxisIndex: 1, data: [0, 1.25] },
      { name: "ICON", xAxisIndex: 1, data: ["-", 0.4] },
      { name: "GFS", xAxisIndex: 2, data: [14.3, 15] },
      { name: "ICON", xAxisIndex: 2, data: [12, "-"] },
    ]);
  });

  it("titles each panel with its unit", () => {
    const option = buildChartOption(RESULT);

    expect(option.title).toMatchObject([
      { text: "Forecast 2025-08-19 12:00–13:00 (Asia/Kolkata)" },
      { text: "Temperature (°C)" },
      { text: "Precipitation (mm)" },
      { text: "Wind Speed (km/h)" },
    ]);
  });
});

describe("ForecastChart", () => {
  it("renders a PNG image", () => {
    const png = new ForecastChart({ width: 400, height: 360 }).render(RESULT);

    expect(png.subarray(0, 8)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
  });
});
