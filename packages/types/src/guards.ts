/**
 * Runtime Type Guards
 *
 * Narrowing functions for values crossing a system boundary
 * (request bodies, restored snapshots, strategist call data).
 */

import type {
  AdaptorCall,
  JsonValue,
  PositionId,
  StrategistCall,
} from "./domain.js";

function isPlainObject(value: unknown): value is { readonly [key: string]: unknown } {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every((item: unknown) => isJsonValue(item));
      }
      return Object.values(value).every((item: unknown) => isJsonValue(item));
    default:
      return false;
  }
}

export function isPositionId(value: unknown): value is PositionId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isStrategistCall(value: unknown): value is StrategistCall {
  if (!isPlainObject(value)) return false;
  return (
    typeof value.fn === "string" &&
    value.fn.length > 0 &&
    isPlainObject(value.args) &&
    isJsonValue(value.args)
  );
}

export function isAdaptorCall(value: unknown): value is AdaptorCall {
  if (!isPlainObject(value)) return false;
  return (
    typeof value.adaptor === "string" &&
    value.adaptor.length > 0 &&
    Array.isArray(value.callData) &&
    value.callData.every((call: unknown) => isStrategistCall(call))
  );
}
