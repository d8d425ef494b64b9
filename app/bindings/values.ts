import { NotationError } from "@notation/errors";
import type { ParamSpec, Value } from "@units/types";

const NUMERIC_LEAD = /^[0-9+-]/;

/**
 * Command tokens starting with a digit or a sign are numbers when they parse
 * as one; everything else stays a string.
 */
export function parseToken(token: string): Value {
  if (NUMERIC_LEAD.test(token)) {
    const parsed = Number(token);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return token;
}

function numericString(value: string): number | null {
  if (value.trim().length === 0) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function convertValue(spec: ParamSpec, value: Value): Value {
  if (spec.type === "string") {
    if (typeof value !== "string") {
      throw new NotationError(
        "TYPE_MISMATCH",
        `Parameter "${spec.name}" expects a string, got ${value}.`
      );
    }
    return value;
  }

  const numeric = typeof value === "number" ? value : numericString(value);
  if (numeric === null || !Number.isFinite(numeric)) {
    throw new NotationError(
      "TYPE_MISMATCH",
      `Parameter "${spec.name}" expects ${spec.type === "integer" ? "an integer" : "a real"}, got "${value}".`
    );
  }
  return spec.type === "integer" ? Math.trunc(numeric) : numeric;
}

export function formatValue(value: Value): string {
  return typeof value === "number" ? String(value) : `"${value}"`;
}
