import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { GET, POST } from "@/app/api/supply/route";

const previousUri = process.env.MONGO_URI;

describe("/api/supply with a malformed store URI", () => {
  beforeAll(() => {
    process.env.MONGO_URI = "localhost:27017";
  });

  afterAll(() => {
    if (previousUri === undefined) {
      delete process.env.MONGO_URI;
    } else {
      process.env.MONGO_URI = previousUri;
    }
  });

  it("GET degrades to an empty series with a warning", async () => {
    const res = await GET();
    expect(res.status).toBe(200);
    const payload = await res.json();
    expect(payload.series).toEqual([]);
    expect(payload.warning).toMatch(/^Failed to read supply data: Invalid scheme/);
  });

  it("POST reports the failed write", async () => {
    const res = await POST(
      new Request("http://localhost/api/supply", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ date: "2024-05-01", time: "10:00", totalSupply: 1 }),
      })
    );
    expect(res.status).toBe(502);
    const payload = await res.json();
    expect(payload.error).toMatch(/^Failed to add data: Invalid scheme/);
  });
});
