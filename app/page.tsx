"use client";

import { type FormEvent, useMemo, useState } from "react";
import useSWR from "swr";
import { buildPriceEmbedUrl } from "@/app/lib/price-embed";
import type { SupplyDashboard } from "@/app/lib/supply-dashboard";
import {
  buildChart,
  dateBounds,
  filterByDateRange,
  formatSignedPercent,
  formatSupply,
  formatTimestamp,
  sortObservations,
  type SortDirection,
  type SortKey,
} from "@/app/lib/supply-format";
import type { MetricKey } from "@/app/lib/supply-metrics";
import type { NewObservationInput } from "@/app/lib/supply-types";

type TabKey = "dashboard" | "history" | "add";

const TABS: Array<{ key: TabKey; label: string }> = [
  { key: "dashboard", label: "Dashboard" },
  { key: "history", label: "Supply History" },
  { key: "add", label: "Add Data" },
];

const EMPTY_SERIES_WARNING = "No supply data available. Please add data in the 'Add Data' tab.";

const fetcher = async (url: string): Promise<SupplyDashboard> => {
  const res = await fetch(url, { cache: "no-store" });
  const payload = (await res.json()) as SupplyDashboard & { error?: string };
  if (!res.ok) {
    throw new Error(payload?.error ?? `Request failed: ${res.status}`);
  }
  return payload;
};

function utcDateInput() {
  return new Date().toISOString().slice(0, 10);
}

function utcTimeInput() {
  return new Date().toISOString().slice(11, 16);
}

function metricToneClass(value: number) {
  if (value > 0) return "text-emerald-300";
  if (value < 0) return "text-rose-300";
  return "text-amber-100";
}

export default function Home() {
  const [tab, setTab] = useState<TabKey>("dashboard");
  const [rangeStart, setRangeStart] = useState<string | null>(null);
  const [rangeEnd, setRangeEnd] = useState<string | null>(null);
  const [sortKey, setSortKey] = useState<SortKey>("timestamp");
  const [sortDirection, setSortDirection] = useState<SortDirection>("asc");

  const [inputDate, setInputDate] = useState(utcDateInput);
  const [inputTime, setInputTime] = useState(utcTimeInput);
  const [inputSupply, setInputSupply] = useState("");
  const [isSaving, setIsSaving] = useState(false);
  const [formError, setFormError] = useState<string | null>(null);
  const [formSuccess, setFormSuccess] = useState<string | null>(null);

  const supply = useSWR<SupplyDashboard>("/api/supply", fetcher, { revalidateOnFocus: false });
  const series = useMemo(() => supply.data?.series ?? [], [supply.data?.series]);
  const metrics = supply.data?.metrics;
  const bounds = useMemo(() => dateBounds(series), [series]);

  const effectiveStart = rangeStart ?? bounds?.start ?? "";
  const effectiveEnd = rangeEnd ?? bounds?.end ?? "";
  const filteredSeries = useMemo(
    () => (bounds ? filterByDateRange(series, effectiveStart, effectiveEnd) : []),
    [bounds, series, effectiveStart, effectiveEnd]
  );
  const chartShape = useMemo(() => buildChart(filteredSeries), [filteredSeries]);
  const tableRows = useMemo(
    () => sortObservations(filteredSeries, sortKey, sortDirection),
    [filteredSeries, sortKey, sortDirection]
  );

  const tiles: Array<{ key: MetricKey; label: string; value: number }> = metrics
    ? [
        { key: "24h", label: "24h Supply Change", value: metrics.change24h },
        { key: "7d", label: "7d Supply Change", value: metrics.change7d },
        { key: "30d", label: "30d Supply Change", value: metrics.change30d },
        { key: "total", label: "Total Supply Change", value: metrics.changeTotal },
      ]
    : [];

  const toggleSort = (key: SortKey) => {
    if (key === sortKey) {
      setSortDirection((prev) => (prev === "asc" ? "desc" : "asc"));
      return;
    }
    setSortKey(key);
    setSortDirection("asc");
  };

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setFormSuccess(null);

    const rawSupply = inputSupply.trim();
    const totalSupply = Number(rawSupply);
    if (!rawSupply || !Number.isFinite(totalSupply) || totalSupply < 0) {
      setFormError("Total supply must be a non-negative number.");
      return;
    }

    const body: NewObservationInput = { date: inputDate, time: inputTime, totalSupply };
    setIsSaving(true);
    try {
      const res = await fetch("/api/supply", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
      const payload = (await res.json()) as { error?: string };
      if (!res.ok) {
        throw new Error(payload?.error ?? "Failed to add data.");
      }
      setFormError(null);
      setFormSuccess(`Successfully added supply data: ${totalSupply} at ${inputDate} ${inputTime} UTC`);
      setInputSupply("");
      await supply.mutate();
    } catch (error) {
      setFormError(error instanceof Error ? error.message : "Failed to add data.");
    } finally {
      setIsSaving(false);
    }
  };

  const warningBanner = (message: string) => (
    <div className="rounded-xl border border-amber-400/45 bg-amber-900/25 p-4 text-sm text-amber-100">{message}</div>
  );

  const loadBanners = (
    <>
      {supply.error && warningBanner(supply.error instanceof Error ? supply.error.message : "Could not load supply data.")}
      {supply.data?.warning && warningBanner(supply.data.warning)}
    </>
  );

  return (
    <main className="min-h-screen bg-[radial-gradient(circle_at_18%_12%,rgba(180,83,9,0.9),rgba(41,22,8,0.96)_42%,rgba(18,11,2,1)_100%)] px-4 py-6 text-amber-100 sm:px-6 lg:px-8">
      <div className="mx-auto w-full max-w-7xl space-y-4">
        <header className="ui-card p-5">
          <p className="text-xs font-semibold uppercase tracking-[0.2em] text-amber-300">PVS on Solana</p>
          <h1 className="mt-1 text-3xl font-black tracking-tight text-amber-100 sm:text-4xl">PVS Cryptocurrency Dashboard</h1>
          <p className="mt-2 max-w-2xl text-sm ui-soft">Track price and supply metrics for PVS on Solana.</p>
        </header>

        <nav className="ui-card p-2">
          <div className="flex flex-wrap items-center gap-2">
            {TABS.map((item) => (
              <button
                key={item.key}
                type="button"
                onClick={() => setTab(item.key)}
                className={`rounded-lg border px-3 py-2 text-xs font-semibold uppercase tracking-wide transition ${
                  tab === item.key
                    ? "border-amber-300/70 bg-amber-400 text-zinc-950 hover:bg-amber-300"
                    : "border-amber-400/40 bg-amber-300/10 text-amber-100 hover:bg-amber-300/20"
                }`}
              >
                {item.label}
              </button>
            ))}
            {supply.isValidating && <span className="ml-auto text-xs ui-soft">Refreshing...</span>}
          </div>
        </nav>

        {tab === "dashboard" && (
          <>
            <section className="ui-card p-5">
              <h2 className="mb-3 text-xl font-bold text-amber-100">PVS Price Chart</h2>
              <iframe
                title="PVS price chart"
                src={buildPriceEmbedUrl()}
                className="h-[600px] w-full rounded-xl border border-amber-500/25"
              />
            </section>

            <section className="ui-card space-y-4 p-5">
              <h2 className="text-xl font-bold text-amber-100">PVS Supply Metrics</h2>
              {loadBanners}
              {supply.isLoading ? (
                <p className="text-sm ui-soft">Loading supply data...</p>
              ) : series.length === 0 ? (
                warningBanner(EMPTY_SERIES_WARNING)
              ) : (
                <>
                  <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
                    {tiles.map((tile) => (
                      <article key={tile.key} className="rounded-xl border border-amber-500/25 bg-black/20 p-4">
                        <p className="text-xs uppercase tracking-wide text-amber-300/90">{tile.label}</p>
                        <p className={`mt-2 text-3xl font-black ${metricToneClass(tile.value)}`}>
                          {formatSignedPercent(tile.value)}
                        </p>
                        {metrics?.insufficientData.includes(tile.key) && (
                          <p className="mt-1 text-[11px] ui-soft">Not enough data in this window</p>
                        )}
                      </article>
                    ))}
                  </div>
                  <article className="rounded-xl border border-amber-500/25 bg-black/20 p-4">
                    <p className="text-xs uppercase tracking-wide text-amber-300/90">Current Total Supply</p>
                    <p className="mt-2 text-3xl font-black text-amber-100">
                      {formatSupply(supply.data?.currentSupply ?? null)}
                    </p>
                  </article>
                </>
              )}
            </section>
          </>
        )}

        {tab === "history" && (
          <section className="ui-card space-y-4 p-5">
            <h2 className="text-xl font-bold text-amber-100">PVS Total Supply History</h2>
            {loadBanners}
            {supply.isLoading ? (
              <p className="text-sm ui-soft">Loading supply data...</p>
            ) : !bounds ? (
              warningBanner(EMPTY_SERIES_WARNING)
            ) : (
              <>
                <div className="grid gap-3 sm:grid-cols-2">
                  <label className="space-y-1">
                    <span className="text-xs text-amber-200/90">From (UTC)</span>
                    <input
                      type="date"
                      value={effectiveStart}
                      min={bounds.start}
                      max={effectiveEnd}
                      onChange={(event) => setRangeStart(event.target.value || null)}
                      className="ui-input"
                    />
                  </label>
                  <label className="space-y-1">
                    <span className="text-xs text-amber-200/90">To (UTC)</span>
                    <input
                      type="date"
                      value={effectiveEnd}
                      min={effectiveStart}
                      max={bounds.end}
                      onChange={(event) => setRangeEnd(event.target.value || null)}
                      className="ui-input"
                    />
                  </label>
                </div>

                {chartShape ? (
                  <div className="h-[320px] w-full">
                    <svg
                      viewBox={`0 0 ${chartShape.width} ${chartShape.height}`}
                      preserveAspectRatio="none"
                      className="h-full w-full"
                      role="img"
                      aria-label="PVS total supply over time"
                    >
                      <defs>
                        <linearGradient id="supplyFill" x1="0" y1="0" x2="0" y2="1">
                          <stop offset="0%" stopColor="#f59e0b" stopOpacity="0.24" />
                          <stop offset="100%" stopColor="#f59e0b" stopOpacity="0.01" />
                        </linearGradient>
                      </defs>
                      <path d={chartShape.area} fill="url(#supplyFill)" />
                      <path d={chartShape.path} fill="none" stroke="#f59e0b" strokeWidth="3" strokeLinecap="round" />
                    </svg>
                    <div className="mt-1 flex justify-between text-[11px] ui-soft">
                      <span>{formatTimestamp(chartShape.minX)}</span>
                      <span>
                        {formatSupply(chartShape.minY)} to {formatSupply(chartShape.maxY)}
                      </span>
                      <span>{formatTimestamp(chartShape.maxX)}</span>
                    </div>
                  </div>
                ) : (
                  <p className="text-sm ui-soft">At least two observations in the selected range are needed to draw the chart.</p>
                )}

                <h3 className="text-base font-semibold text-amber-50">Historical Data</h3>
                <div className="max-h-[480px] overflow-y-auto rounded-xl border border-amber-500/25">
                  <table className="w-full text-left text-sm">
                    <thead className="sticky top-0 bg-zinc-950/90 text-xs uppercase tracking-wide text-amber-300">
                      <tr>
                        {(["timestamp", "totalSupply"] as const).map((key) => (
                          <th key={key} className="px-3 py-2">
                            <button type="button" onClick={() => toggleSort(key)} className="uppercase">
                              {key === "timestamp" ? "Time (UTC)" : "Total Supply"}
                              {sortKey === key ? (sortDirection === "asc" ? " ▲" : " ▼") : ""}
                            </button>
                          </th>
                        ))}
                      </tr>
                    </thead>
                    <tbody>
                      {tableRows.map((row, index) => (
                        <tr key={`${row.timestamp}-${index}`} className="border-t border-amber-500/15">
                          <td className="px-3 py-2 font-mono text-xs">{formatTimestamp(row.timestamp)}</td>
                          <td className="px-3 py-2">{row.totalSupply.toLocaleString("en-US")}</td>
                        </tr>
                      ))}
                    </tbody>
                  </table>
                </div>
              </>
            )}
          </section>
        )}

        {tab === "add" && (
          <section className="ui-card p-5">
            <div className="mb-4">
              <p className="text-xs font-semibold uppercase tracking-[0.18em] text-amber-300">New Observation</p>
              <h2 className="mt-1 text-xl font-bold text-amber-100">Add New Supply Data</h2>
            </div>

            <form onSubmit={handleSubmit} className="max-w-xl space-y-3">
              <div className="grid gap-3 sm:grid-cols-2">
                <label className="space-y-1">
                  <span className="text-xs text-amber-200/90">Date (UTC)</span>
                  <input
                    type="date"
                    required
                    value={inputDate}
                    onChange={(event) => setInputDate(event.target.value)}
                    className="ui-input"
                  />
                </label>
                <label className="space-y-1">
                  <span className="text-xs text-amber-200/90">Time (UTC)</span>
                  <input
                    type="time"
                    required
                    value={inputTime}
                    onChange={(event) => setInputTime(event.target.value)}
                    className="ui-input"
                  />
                </label>
              </div>

              <label className="block space-y-1">
                <span className="text-xs text-amber-200/90">Total Supply</span>
                <input
                  type="number"
                  required
                  min={0}
                  step="0.01"
                  value={inputSupply}
                  onChange={(event) => setInputSupply(event.target.value)}
                  placeholder="0.00"
                  className="ui-input"
                />
              </label>

              {formError && <p className="text-xs text-rose-300">{formError}</p>}
              {formSuccess && <p className="text-xs text-emerald-300">{formSuccess}</p>}

              <button
                type="submit"
                disabled={isSaving}
                className="w-full rounded-xl border border-amber-300/40 bg-[linear-gradient(115deg,rgba(245,158,11,0.36),rgba(180,83,9,0.42))] px-4 py-2 text-sm font-semibold text-amber-50 transition hover:brightness-110 disabled:cursor-not-allowed disabled:opacity-60"
              >
                {isSaving ? "Saving..." : "Add Data"}
              </button>
            </form>
          </section>
        )}
      </div>
    </main>
  );
}
