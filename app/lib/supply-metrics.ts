import type { SupplyObservation } from "@/app/lib/supply-types";

export type WindowKey = "24h" | "7d" | "30d";
export type MetricKey = WindowKey | "total";

export type SupplyMetrics = {
  change24h: number;
  change7d: number;
  change30d: number;
  changeTotal: number;
  /** Metrics that had fewer than two observations to compare; their value is reported as 0. */
  insufficientData: MetricKey[];
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const WINDOW_MS: Record<WindowKey, number> = {
  "24h": DAY_MS,
  "7d": 7 * DAY_MS,
  "30d": 30 * DAY_MS,
};

export const METRIC_KEYS: MetricKey[] = ["24h", "7d", "30d", "total"];

export function percentChange(from: number, to: number) {
  if (from === 0) return 0;
  return ((to - from) / from) * 100;
}

export function latestObservation(series: readonly SupplyObservation[]) {
  return series.length > 0 ? series[series.length - 1] : null;
}

function windowChange(
  series: readonly SupplyObservation[],
  latest: SupplyObservation,
  windowMs: number
): number | null {
  const cutoff = latest.timestamp - windowMs;
  const inWindow = series.filter((point) => point.timestamp >= cutoff);
  if (inWindow.length < 2) return null;
  return percentChange(inWindow[0].totalSupply, latest.totalSupply);
}

/**
 * Percentage change of total supply over trailing windows.
 *
 * `series` must be sorted ascending by timestamp. Windows are anchored on the
 * last observation rather than the current time, so a stale series still
 * reports changes relative to its own latest point. Each window takes as its
 * baseline the earliest observation at or after `latest - window`.
 */
export function computeMetrics(series: readonly SupplyObservation[]): SupplyMetrics {
  const latest = latestObservation(series);
  if (!latest || series.length < 2) {
    return {
      change24h: 0,
      change7d: 0,
      change30d: 0,
      changeTotal: 0,
      insufficientData: [...METRIC_KEYS],
    };
  }

  const insufficientData: MetricKey[] = [];
  const changeFor = (key: WindowKey) => {
    const change = windowChange(series, latest, WINDOW_MS[key]);
    if (change == null) {
      insufficientData.push(key);
      return 0;
    }
    return change;
  };

  return {
    change24h: changeFor("24h"),
    change7d: changeFor("7d"),
    change30d: changeFor("30d"),
    changeTotal: percentChange(series[0].totalSupply, latest.totalSupply),
    insufficientData,
  };
}
