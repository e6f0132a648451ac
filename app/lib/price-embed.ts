export const PVS_PAIR_ID = "98nocLbiDi9ykAjwAUJW9fnYZsf4L4KLCfH7U2LFXDsv";

export function buildPriceEmbedUrl(pairId: string = PVS_PAIR_ID) {
  const params = new URLSearchParams({
    embed: "1",
    loadChartSettings: "0",
    chartLeftToolbar: "0",
    chartTheme: "dark",
    theme: "dark",
    chartStyle: "0",
    chartType: "usd",
    interval: "15",
  });
  return `https://dexscreener.com/solana/${encodeURIComponent(pairId)}?${params.toString()}`;
}
