import type { SupplyObservation } from "@/app/lib/supply-types";

export type SortKey = "timestamp" | "totalSupply";
export type SortDirection = "asc" | "desc";

export function formatSignedPercent(n: number | null) {
  if (n == null) return "N/A";
  const sign = n > 0 ? "+" : "";
  return `${sign}${n.toFixed(2)}%`;
}

export function formatSupply(n: number | null) {
  if (n == null) return "—";
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

/** `YYYY-MM-DD HH:MM:SS`, always in UTC. */
export function formatTimestamp(ts: number) {
  return new Date(ts).toISOString().slice(0, 19).replace("T", " ");
}

export function toIsoDate(ts: number) {
  return new Date(ts).toISOString().slice(0, 10);
}

export function dateBounds(series: readonly SupplyObservation[]) {
  if (series.length === 0) return null;
  let min = series[0].timestamp;
  let max = series[0].timestamp;
  for (const point of series) {
    if (point.timestamp < min) min = point.timestamp;
    if (point.timestamp > max) max = point.timestamp;
  }
  return { start: toIsoDate(min), end: toIsoDate(max) };
}

/** Points whose UTC calendar date falls within `[startDate, endDate]`, both inclusive. */
export function filterByDateRange(
  series: readonly SupplyObservation[],
  startDate: string,
  endDate: string
) {
  return series.filter((point) => {
    const day = toIsoDate(point.timestamp);
    return day >= startDate && day <= endDate;
  });
}

export function sortObservations(
  series: readonly SupplyObservation[],
  key: SortKey,
  direction: SortDirection
) {
  const factor = direction === "asc" ? 1 : -1;
  return [...series].sort((a, b) => (a[key] - b[key]) * factor);
}

export function buildChart(points: readonly SupplyObservation[]) {
  if (points.length < 2) {
    return null;
  }

  const width = 1000;
  const height = 420;
  const padX = 4;
  const padY = 4;
  const minY = Math.min(...points.map((point) => point.totalSupply));
  const maxY = Math.max(...points.map((point) => point.totalSupply));
  const minX = points[0].timestamp;
  const maxX = points[points.length - 1].timestamp;

  const xRange = Math.max(1, maxX - minX);
  const yRange = Math.max(1, maxY - minY);

  const toX = (value: number) => padX + ((value - minX) / xRange) * (width - padX * 2);
  const toY = (value: number) => height - padY - ((value - minY) / yRange) * (height - padY * 2);

  const coords = points.map((point) => ({ x: toX(point.timestamp), y: toY(point.totalSupply) }));
  const path = coords
    .map((point, index) => `${index === 0 ? "M" : "L"}${point.x.toFixed(2)} ${point.y.toFixed(2)}`)
    .join(" ");
  const last = coords[coords.length - 1];
  const area = `${path} L${last.x.toFixed(2)} ${(height - padY).toFixed(2)} L${coords[0].x.toFixed(2)} ${(height - padY).toFixed(2)} Z`;

  return {
    width,
    height,
    padX,
    padY,
    minX,
    maxX,
    minY,
    maxY,
    path,
    area,
    coords,
  };
}
