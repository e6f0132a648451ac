import { z } from "zod";

export type SupplyObservation = {
  readonly timestamp: number;
  readonly totalSupply: number;
};

export type StoredSupplyDocument = {
  timestamp: string;
  total_supply: number;
};

export type NewObservationInput = z.infer<typeof newObservationSchema>;

export class ObservationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ObservationValidationError";
  }
}

const OFFSET_SUFFIX = /(?:z|[+-]\d{2}:?\d{2})$/i;
const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a stored or submitted timestamp into epoch milliseconds.
 * Strings without an explicit offset are read as UTC.
 */
export function parseTimestamp(value: string | Date): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }

  const raw = value.trim();
  let ms = Number.NaN;
  if (OFFSET_SUFFIX.test(raw)) {
    ms = Date.parse(raw.replace(" ", "T"));
  } else if (LOCAL_DATE_TIME.test(raw)) {
    ms = Date.parse(`${raw.replace(" ", "T")}Z`);
  } else if (DATE_ONLY.test(raw)) {
    ms = Date.parse(`${raw}T00:00:00Z`);
  }
  return Number.isFinite(ms) ? ms : null;
}

const timestampSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const ms = parseTimestamp(value);
  if (ms == null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid timestamp" });
    return z.NEVER;
  }
  return ms;
});

const supplyValueSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((value) => Number(value))
  .pipe(z.number().finite().nonnegative());

// Documents written before the field rename carry `time` instead of `timestamp`.
function withLegacyTimeField(doc: unknown): unknown {
  if (typeof doc !== "object" || doc === null) return doc;
  if ("timestamp" in doc || !("time" in doc)) return doc;
  return { ...doc, timestamp: doc.time };
}

export const supplyDocumentSchema = z.preprocess(
  withLegacyTimeField,
  z.object({
    timestamp: timestampSchema,
    total_supply: supplyValueSchema,
  })
);

export const newObservationSchema = z.object({
  date: z.string().trim().regex(DATE_ONLY, "Date must be YYYY-MM-DD"),
  time: z
    .string()
    .trim()
    .regex(/^\d{2}:\d{2}(?::\d{2})?$/, "Time must be HH:MM or HH:MM:SS"),
  totalSupply: z
    .number({ invalid_type_error: "Total supply must be a number" })
    .finite("Total supply must be finite")
    .nonnegative("Total supply cannot be negative"),
});

function describeIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseSupplyDocument(doc: unknown): SupplyObservation {
  const result = supplyDocumentSchema.safeParse(doc);
  if (!result.success) {
    throw new ObservationValidationError(describeIssues(result.error));
  }
  return {
    timestamp: result.data.timestamp,
    totalSupply: result.data.total_supply,
  };
}

export function parseNewObservation(body: unknown): SupplyObservation {
  const result = newObservationSchema.safeParse(body);
  if (!result.success) {
    throw new ObservationValidationError(describeIssues(result.error));
  }
  const { date, time, totalSupply } = result.data;
  const timestamp = parseTimestamp(`${date}T${time}`);
  if (timestamp == null) {
    throw new ObservationValidationError(`Invalid date/time: ${date} ${time}`);
  }
  return { timestamp, totalSupply };
}

export function assertValidObservation(observation: SupplyObservation) {
  if (!Number.isFinite(observation.timestamp)) {
    throw new ObservationValidationError("timestamp must be a finite epoch value");
  }
  if (!Number.isFinite(observation.totalSupply) || observation.totalSupply < 0) {
    throw new ObservationValidationError("total supply must be a finite non-negative number");
  }
}

export function toSupplyDocument(observation: SupplyObservation): StoredSupplyDocument {
  assertValidObservation(observation);
  return {
    timestamp: new Date(observation.timestamp).toISOString(),
    total_supply: observation.totalSupply,
  };
}
