import { loadConfig } from "@/app/lib/config";
import { createMongoSupplyStore, type SupplyStore } from "@/app/lib/supply-store";

let store: SupplyStore | null = null;

// Configuration is resolved on first use and kept for the life of the process.
export function getSupplyStore() {
  if (!store) {
    store = createMongoSupplyStore(loadConfig());
  }
  return store;
}
