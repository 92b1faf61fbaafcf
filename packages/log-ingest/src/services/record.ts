import { InvalidRecordError } from "../errors.js";
import {
  parseLevel,
  type JsonValue,
  type LogLevel,
  type LogMetadata,
  type LogRecord,
} from "../types.js";

/** A raw record that passed validation but has no id yet. */
export interface ValidatedRecord {
  service: string;
  level: LogLevel;
  message: string;
  metadata?: LogMetadata;
  correlationId?: string;
  /** The producer's own clock reading; kept as metadata, never as the record timestamp. */
  producedAt?: number;
}

/** Metadata key that carries the producer's timestamp. */
export const PRODUCED_AT_KEY = "producedAt";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isPlainObject(value)) return Object.values(value).every(isJsonValue);
  return false;
}

function isMetadata(value: unknown): value is LogMetadata {
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}

/**
 * Validate and normalize a producer's record (a RawLogRecord, or anything
 * decoded off the wire). Throws InvalidRecordError.
 */
export function validateRawRecord(raw: unknown): ValidatedRecord {
  if (!isPlainObject(raw)) {
    throw new InvalidRecordError("Record must be an object");
  }

  if (typeof raw.service !== "string" || raw.service.trim() === "") {
    throw new InvalidRecordError("Field service must be a non-empty string");
  }

  if (typeof raw.level !== "string") {
    throw new InvalidRecordError("Field level must be a string");
  }
  const level = parseLevel(raw.level);
  if (!level) {
    throw new InvalidRecordError(`Unknown log level "${raw.level}"`);
  }

  if (typeof raw.message !== "string") {
    throw new InvalidRecordError("Field message must be a string");
  }

  if (raw.metadata !== undefined && !isPlainObject(raw.metadata)) {
    throw new InvalidRecordError("Field metadata must be an object");
  }
  const metadata = raw.metadata;
  if (metadata !== undefined && !isMetadata(metadata)) {
    throw new InvalidRecordError("Field metadata must hold only JSON values");
  }

  if (raw.correlationId !== undefined && (typeof raw.correlationId !== "string" || raw.correlationId === "")) {
    throw new InvalidRecordError("Field correlationId must be a non-empty string");
  }

  const validated: ValidatedRecord = {
    service: raw.service.trim(),
    level,
    message: raw.message,
  };
  if (metadata !== undefined) validated.metadata = metadata;
  if (typeof raw.correlationId === "string") validated.correlationId = raw.correlationId;
  if (raw.timestamp !== undefined) validated.producedAt = parseTimestamp(raw.timestamp);

  return validated;
}

function parseTimestamp(value: unknown): number {
  if (typeof value !== "number" && typeof value !== "string") {
    throw new InvalidRecordError("Field timestamp must be epoch milliseconds or an ISO-8601 string");
  }
  const ms = typeof value === "number" ? value : Date.parse(value);
  if (!Number.isFinite(ms) || ms < 0) {
    throw new InvalidRecordError(`Invalid timestamp "${String(value)}"`);
  }
  return Math.floor(ms);
}

function deepFreeze(value: JsonValue): void {
  if (value === null || typeof value !== "object") return;
  const children: JsonValue[] = Array.isArray(value) ? value : Object.values(value);
  children.forEach(deepFreeze);
  Object.freeze(value);
}

/**
 * Build an immutable LogRecord. Metadata is copied before freezing so the
 * producer's object is never frozen or shared.
 */
export function freezeRecord(fields: LogRecord): LogRecord {
  const record: {
    id: string;
    timestamp: number;
    level: LogLevel;
    service: string;
    message: string;
    metadata?: LogMetadata;
    correlationId?: string;
  } = {
    id: fields.id,
    timestamp: fields.timestamp,
    level: fields.level,
    service: fields.service,
    message: fields.message,
  };
  if (fields.metadata !== undefined) {
    const copy: LogMetadata = structuredClone(fields.metadata);
    deepFreeze(copy);
    record.metadata = copy;
  }
  if (fields.correlationId !== undefined) record.correlationId = fields.correlationId;
  return Object.freeze(record);
}

/**
 * Assign id and timestamp to a validated record. The timestamp is always
 * the clock reading encoded in the id, so timestamp order and id order
 * agree. A producer timestamp moves to `metadata.producedAt` unless the
 * producer already set that key.
 */
export function buildRecord(validated: ValidatedRecord, id: string, clockMs: number): LogRecord {
  const { producedAt, ...fields } = validated;
  let metadata = fields.metadata;
  if (producedAt !== undefined && metadata?.[PRODUCED_AT_KEY] === undefined) {
    metadata = { ...metadata, [PRODUCED_AT_KEY]: new Date(producedAt).toISOString() };
  }
  return freezeRecord({
    ...fields,
    ...(metadata !== undefined ? { metadata } : {}),
    id,
    timestamp: clockMs,
  });
}

/** Order by (timestamp, id). */
export function compareRecords(a: LogRecord, b: LogRecord): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
