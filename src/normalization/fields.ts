/**
 * Field readers for raw exchange payloads.
 *
 * Exchange numbers arrive either as JSON numbers or as decimal strings.
 * Required readers throw NormalizationError; optional readers return the
 * supplied fallback.
 */

import { NormalizationError } from "../errors/app.errors";

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

export function requireString(record: RawRecord, field: string): string {
  const value = toText(record[field]);
  if (value === undefined) {
    throw new NormalizationError(`missing field "${field}"`);
  }
  return value;
}

export function optionalString(
  record: RawRecord,
  field: string,
): string | undefined {
  return toText(record[field]);
}

export function requireNumber(record: RawRecord, field: string): number {
  const value = toNumber(record[field]);
  if (value === undefined) {
    throw new NormalizationError(`missing or non-numeric field "${field}"`);
  }
  return value;
}

export function optionalNumber(
  record: RawRecord,
  field: string,
  fallback: number,
): number {
  return toNumber(record[field]) ?? fallback;
}

export function optionalBoolean(
  record: RawRecord,
  field: string,
  fallback: boolean,
): boolean {
  const value = record[field];
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Error envelope: `{ error: { code?, message } }` or `{ error: "message" }`
 */
export function extractExchangeError(payload: unknown): string | undefined {
  if (!isRecord(payload) || payload.error === undefined || payload.error === null) {
    return undefined;
  }
  const { error } = payload;
  if (typeof error === "string") return error;
  if (isRecord(error)) {
    const message = toText(error.message) ?? JSON.stringify(error);
    const code = toText(error.code);
    return code ? `${message} (code ${code})` : message;
  }
  return String(error);
}

/**
 * Items of a payload: a bare array, `{ result: [...] }`, `{ result: { <field>: [...] } }`,
 * `{ <field>: [...] }`, or a single object.
 */
export function extractItems(payload: unknown, field: string): unknown[] {
  const body = isRecord(payload) && "result" in payload ? payload.result : payload;
  if (Array.isArray(body)) return body;
  if (!isRecord(body)) return [];
  const nested = body[field];
  if (Array.isArray(nested)) return nested;
  if (isRecord(nested)) return [nested];
  return [body];
}
