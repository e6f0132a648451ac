import { MongoClient, type Document } from "mongodb";
import type { AppConfig } from "@/app/lib/config";
import { logger } from "@/app/lib/logger";
import {
  parseSupplyDocument,
  toSupplyDocument,
  type StoredSupplyDocument,
  type SupplyObservation,
} from "@/app/lib/supply-types";

export interface SupplyCollection {
  findAll(): Promise<unknown[]>;
  insert(doc: StoredSupplyDocument): Promise<void>;
}

export type FetchResult = {
  observations: SupplyObservation[];
  warning: string | null;
};

export type AppendResult = { ok: true } | { ok: false; error: string };

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : "unknown error";
}

export function sortByTimestamp(observations: readonly SupplyObservation[]) {
  return [...observations].sort((a, b) => a.timestamp - b.timestamp);
}

export class SupplyStore {
  constructor(private readonly collection: SupplyCollection) {}

  async fetchAll(): Promise<FetchResult> {
    let docs: unknown[];
    try {
      docs = await this.collection.findAll();
    } catch (error) {
      logger.error({ err: error }, "supply read failed");
      return {
        observations: [],
        warning: `Failed to read supply data: ${errorMessage(error)}`,
      };
    }

    const observations: SupplyObservation[] = [];
    let rejected = 0;
    for (const doc of docs) {
      try {
        observations.push(parseSupplyDocument(doc));
      } catch (error) {
        rejected += 1;
        logger.warn({ err: error }, "supply document rejected");
      }
    }

    logger.debug({ count: observations.length, rejected }, "supply read");
    return {
      observations: sortByTimestamp(observations),
      warning: rejected > 0 ? `Skipped ${rejected} invalid supply record(s).` : null,
    };
  }

  async append(observation: SupplyObservation): Promise<AppendResult> {
    try {
      await this.collection.insert(toSupplyDocument(observation));
    } catch (error) {
      logger.error({ err: error }, "supply append failed");
      return { ok: false, error: `Failed to add data: ${errorMessage(error)}` };
    }
    logger.info(
      { timestamp: observation.timestamp, totalSupply: observation.totalSupply },
      "supply observation added"
    );
    return { ok: true };
  }
}

const PROJECTION = { _id: 0, timestamp: 1, time: 1, total_supply: 1 };

export interface MongoCollectionLike {
  find(filter: Document, options: { projection: Document }): { toArray(): Promise<Document[]> };
  insertOne(doc: Document): Promise<unknown>;
}

// The collection is resolved per call so a bad URI surfaces as a failed read or write.
export function mongoSupplyCollection(resolve: () => MongoCollectionLike): SupplyCollection {
  return {
    findAll: async () => resolve().find({}, { projection: PROJECTION }).toArray(),
    insert: async (doc) => {
      await resolve().insertOne({ ...doc });
    },
  };
}

const clients = new Map<string, MongoClient>();

export function getMongoClient(uri: string) {
  let client = clients.get(uri);
  if (!client) {
    client = new MongoClient(uri);
    clients.set(uri, client);
  }
  return client;
}

export function createMongoSupplyStore(config: AppConfig) {
  return new SupplyStore(
    mongoSupplyCollection(() =>
      getMongoClient(config.mongoUri).db(config.databaseName).collection(config.collectionName)
    )
  );
}
