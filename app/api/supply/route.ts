import { NextResponse } from "next/server";
import { ConfigError } from "@/app/lib/config";
import { logger } from "@/app/lib/logger";
import { loadSupplyDashboard } from "@/app/lib/supply-dashboard";
import { getSupplyStore } from "@/app/lib/supply-registry";
import type { SupplyStore } from "@/app/lib/supply-store";
import {
  ObservationValidationError,
  parseNewObservation,
  type SupplyObservation,
} from "@/app/lib/supply-types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

function resolveStore(): { store: SupplyStore } | { response: NextResponse } {
  try {
    return { store: getSupplyStore() };
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ err: error }, "supply store is not configured");
      return {
        response: NextResponse.json({ error: error.message }, { status: 503 }),
      };
    }
    throw error;
  }
}

export async function GET() {
  const resolved = resolveStore();
  if ("response" in resolved) return resolved.response;

  const dashboard = await loadSupplyDashboard(resolved.store);
  return NextResponse.json(dashboard, {
    headers: { "Cache-Control": "no-store" },
  });
}

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  let observation: SupplyObservation;
  try {
    observation = parseNewObservation(body);
  } catch (error) {
    if (error instanceof ObservationValidationError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    throw error;
  }

  const resolved = resolveStore();
  if ("response" in resolved) return resolved.response;

  const result = await resolved.store.append(observation);
  if (!result.ok) {
    return NextResponse.json({ error: result.error }, { status: 502 });
  }
  return NextResponse.json({ observation }, { status: 201 });
}
