import { z } from "zod";

export type AppConfig = {
  mongoUri: string;
  databaseName: string;
  collectionName: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_DATABASE = "pvs_db";
const DEFAULT_COLLECTION = "pvs_db";

const optionalName = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  MONGO_URI: z
    .string({ required_error: "MONGO_URI is not set" })
    .trim()
    .min(1, "MONGO_URI is empty"),
  MONGO_DB: optionalName,
  MONGO_COLLECTION: optionalName,
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid store configuration: ${detail}`);
  }

  return {
    mongoUri: result.data.MONGO_URI,
    databaseName: result.data.MONGO_DB ?? DEFAULT_DATABASE,
    collectionName: result.data.MONGO_COLLECTION ?? DEFAULT_COLLECTION,
  };
}
