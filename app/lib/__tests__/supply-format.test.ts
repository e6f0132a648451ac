import { describe, expect, it } from "vitest";
import { buildPriceEmbedUrl, PVS_PAIR_ID } from "@/app/lib/price-embed";
import {
  buildChart,
  dateBounds,
  filterByDateRange,
  formatSignedPercent,
  formatSupply,
  formatTimestamp,
  sortObservations,
} from "@/app/lib/supply-format";

const series = [
  { timestamp: Date.UTC(2024, 0, 1, 23, 59), totalSupply: 400 },
  { timestamp: Date.UTC(2024, 0, 2, 0, 0), totalSupply: 300 },
  { timestamp: Date.UTC(2024, 0, 3, 12, 0), totalSupply: 500 },
  { timestamp: Date.UTC(2024, 0, 4, 8, 0), totalSupply: 100 },
];

describe("formatting", () => {
  it("formats signed percentages with two decimals", () => {
    expect(formatSignedPercent(1.234)).toBe("+1.23%");
    expect(formatSignedPercent(-3.5294)).toBe("-3.53%");
    expect(formatSignedPercent(0)).toBe("0.00%");
    expect(formatSignedPercent(null)).toBe("N/A");
  });

  it("formats supply without decimals", () => {
    expect(formatSupply(1234567.89)).toBe("1,234,568");
    expect(formatSupply(null)).toBe("—");
  });

  it("formats timestamps in UTC", () => {
    expect(formatTimestamp(Date.UTC(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04:05");
  });
});

describe("history view helpers", () => {
  it("filters by inclusive UTC calendar dates", () => {
    expect(filterByDateRange(series, "2024-01-02", "2024-01-03").map((p) => p.totalSupply)).toEqual([300, 500]);
  });

  it("returns nothing for an inverted range", () => {
    expect(filterByDateRange(series, "2024-01-04", "2024-01-01")).toEqual([]);
  });

  it("finds the first and last calendar dates", () => {
    expect(dateBounds(series)).toEqual({ start: "2024-01-01", end: "2024-01-04" });
    expect(dateBounds([])).toBeNull();
  });

  it("sorts rows by either column in either direction", () => {
    expect(sortObservations(series, "totalSupply", "desc").map((p) => p.totalSupply)).toEqual([500, 400, 300, 100]);
    expect(sortObservations(series, "timestamp", "desc").map((p) => p.totalSupply)).toEqual([100, 500, 300, 400]);
  });

  it("needs two points to draw a chart", () => {
    expect(buildChart(series.slice(0, 1))).toBeNull();
  });

  it("maps the series onto the chart box", () => {
    const chart = buildChart([
      { timestamp: 0, totalSupply: 100 },
      { timestamp: 1000, totalSupply: 200 },
    ]);
    expect(chart?.path).toBe("M4.00 416.00 L996.00 4.00");
    expect(chart?.minY).toBe(100);
    expect(chart?.maxY).toBe(200);
  });
});

describe("buildPriceEmbedUrl", () => {
  it("points at the fixed PVS pair", () => {
    expect(buildPriceEmbedUrl()).toBe(
      `https://dexscreener.com/solana/${PVS_PAIR_ID}?embed=1&loadChartSettings=0&chartLeftToolbar=0&chartTheme=dark&theme=dark&chartStyle=0&chartType=usd&interval=15`
    );
  });
});
