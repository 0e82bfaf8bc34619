import { Resvg } from "@resvg/resvg-js";
import * as echarts from "echarts";
import type { EChartsOption, LineSeriesOption, XAXisComponentOption, YAXisComponentOption } from "echarts";
import { describeWindow } from "./format.js";
import type { ForecastResult, HourlyValues, ModelSeries } from "./types.js";

export interface ChartRenderer {
  /** PNG image of the forecast */
  render(result: ForecastResult): Buffer;
}

export interface ChartSize {
  width: number;
  height: number;
}

type Variable = "temperature" | "precipitation" | "windSpeed";

interface Panel {
  variable: Variable;
  title: string;
  symbol: string;
  lineType: "solid" | "dashed" | "dotted";
}

const timeLabel = (h: HourlyValues) => h.time.slice(11, 16);

function panelsFor(result: ForecastResult): Panel[] {
  const { units } = result;
  return [
    { variable: "temperature", title: `Temperature (${units.temperature})`, symbol: "circle", lineType: "solid" },
    { variable: "precipitation", title: `Precipitation (${units.precipitation})`, symbol: "rect", lineType: "dashed" },
    { variable: "windSpeed", title: `Wind Speed (${units.windSpeed})`, symbol: "triangle", lineType: "dotted" },
  ];
}

function valuesFor(series: ModelSeries, labels: string[], variable: Variable): (number | "-")[] {
  const byLabel = new Map(series.hours.map((h) => [timeLabel(h), h[variable]]));
  // "-" is how ECharts marks a gap in a line
  return labels.map((label) => byLabel.get(label) ?? "-");
}

/** Three stacked panels (temperature, precipitation, wind), one line per model. */
export function buildChartOption(result: ForecastResult): EChartsOption {
  const labels = [...new Set(result.series.flatMap((s) => s.hours.map(timeLabel)))].sort();
  const panels = panelsFor(result);
  const models = result.series.map((s) => s.model);

  const series = panels.flatMap((panel, i) =>
    result.series.map(
      (s): LineSeriesOption => ({
        type: "line",
        name: s.model,
        xAxisIndex: i,
        yAxisIndex: i,
        symbol: panel.symbol,
        lineStyle: { type: panel.lineType },
        data: valuesFor(s, labels, panel.variable),
      }),
    ),
  );

  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: [
      { text: `Forecast ${describeWindow(result.request)}`, left: "center", top: 4 },
      ...panels.map((panel, i) => ({ text: panel.title, left: 60, top: `${6 + i * 31}%`, textStyle: { fontSize: 13 } })),
    ],
    legend: { data: models, orient: "vertical", right: 10, top: "middle" },
    grid: panels.map((_, i) => ({ left: 60, right: 140, top: `${10 + i * 31}%`, height: "20%" })),
    xAxis: panels.map((_, i): XAXisComponentOption => ({ type: "category", gridIndex: i, data: labels, boundaryGap: false })),
    yAxis: panels.map((_, i): YAXisComponentOption => ({ type: "value", gridIndex: i, scale: true })),
    series,
  };
}

export class ForecastChart implements ChartRenderer {
  constructor(private readonly size: ChartSize = { width: 1000, height: 900 }) {}

  public render(result: ForecastResult): Buffer {
    const chart = echarts.init(null, null, { renderer: "svg", ssr: true, ...this.size });
    let svg: string;
    try {
      chart.setOption(buildChartOption(result));
      svg = chart.renderToSVGString();
    } finally {
      chart.dispose();
    }

    return new Resvg(svg, { background: "#ffffff", fitTo: { mode: "original" } }).render().asPng();
  }
}
