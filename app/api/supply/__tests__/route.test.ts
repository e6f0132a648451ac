import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "@/app/lib/config";
import { getSupplyStore } from "@/app/lib/supply-registry";
import { SupplyStore } from "@/app/lib/supply-store";
import { MemoryCollection } from "@/app/lib/__tests__/memory-collection";
import { GET, POST } from "@/app/api/supply/route";

vi.mock("@/app/lib/supply-registry", () => ({
  getSupplyStore: vi.fn(),
}));

function postRequest(body: string) {
  return new Request("http://localhost/api/supply", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("/api/supply", () => {
  let collection: MemoryCollection;

  beforeEach(() => {
    collection = new MemoryCollection();
    vi.mocked(getSupplyStore).mockReset();
    vi.mocked(getSupplyStore).mockReturnValue(new SupplyStore(collection));
  });

  it("GET returns the series with its metrics", async () => {
    collection.docs = [
      { timestamp: "2024-05-01T11:00:00Z", total_supply: 90 },
      { timestamp: "2024-05-01T10:00:00Z", total_supply: 100 },
    ];

    const res = await GET();
    expect(res.status).toBe(200);
    expect(res.headers.get("Cache-Control")).toBe("no-store");

    const payload = await res.json();
    expect(payload.series).toEqual([
      { timestamp: Date.UTC(2024, 4, 1, 10), totalSupply: 100 },
      { timestamp: Date.UTC(2024, 4, 1, 11), totalSupply: 90 },
    ]);
    expect(payload.currentSupply).toBe(90);
    expect(payload.metrics.change24h).toBeCloseTo(-10, 10);
    expect(payload.warning).toBeNull();
  });

  it("GET still answers when the store cannot be read", async () => {
    collection.readError = new Error("connection refused");

    const res = await GET();
    expect(res.status).toBe(200);
    const payload = await res.json();
    expect(payload.series).toEqual([]);
    expect(payload.warning).toBe("Failed to read supply data: connection refused");
  });

  it("GET answers 503 when the store is not configured", async () => {
    vi.mocked(getSupplyStore).mockImplementation(() => {
      throw new ConfigError("Invalid store configuration: MONGO_URI is not set");
    });

    const res = await GET();
    expect(res.status).toBe(503);
    await expect(res.json()).resolves.toEqual({
      error: "Invalid store configuration: MONGO_URI is not set",
    });
  });

  it("POST stores the submitted observation", async () => {
    const res = await POST(postRequest(JSON.stringify({ date: "2024-05-01", time: "10:00", totalSupply: 1500 })));

    expect(res.status).toBe(201);
    await expect(res.json()).resolves.toEqual({
      observation: { timestamp: Date.UTC(2024, 4, 1, 10), totalSupply: 1500 },
    });
    expect(collection.docs).toEqual([{ timestamp: "2024-05-01T10:00:00.000Z", total_supply: 1500 }]);
  });

  it("POST rejects a body that is not JSON", async () => {
    const res = await POST(postRequest("{"));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: "Invalid JSON body" });
  });

  it("POST rejects a negative supply without touching the store", async () => {
    const res = await POST(postRequest(JSON.stringify({ date: "2024-05-01", time: "10:00", totalSupply: -1 })));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: "totalSupply: Total supply cannot be negative" });
    expect(collection.docs).toEqual([]);
  });

  it("POST reports a failed write", async () => {
    collection.writeError = new Error("not primary");

    const res = await POST(postRequest(JSON.stringify({ date: "2024-05-01", time: "10:00", totalSupply: 1 })));
    expect(res.status).toBe(502);
    await expect(res.json()).resolves.toEqual({ error: "Failed to add data: not primary" });
  });
});
