import { computeMetrics, latestObservation, type SupplyMetrics } from "@/app/lib/supply-metrics";
import type { SupplyStore } from "@/app/lib/supply-store";
import type { SupplyObservation } from "@/app/lib/supply-types";

export type SupplyDashboard = {
  series: SupplyObservation[];
  metrics: SupplyMetrics;
  currentSupply: number | null;
  warning: string | null;
  ts: number;
};

export async function loadSupplyDashboard(store: Pick<SupplyStore, "fetchAll">): Promise<SupplyDashboard> {
  const { observations, warning } = await store.fetchAll();
  return {
    series: observations,
    metrics: computeMetrics(observations),
    currentSupply: latestObservation(observations)?.totalSupply ?? null,
    warning,
    ts: Date.now(),
  };
}
