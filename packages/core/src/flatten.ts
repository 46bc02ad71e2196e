import { isJsonObject, type FlatRecord, type JsonValue } from "./types.js";

/**
 * Flatten nested objects into dot-qualified keys.
 * Arrays are leaves; empty objects vanish.
 */
export function flattenObject(value: JsonValue, parentKey = "", sep = "."): FlatRecord {
  const out: FlatRecord = {};
  if (!isJsonObject(value)) {
    if (parentKey) out[parentKey] = value;
    return out;
  }
  for (const [key, child] of Object.entries(value)) {
    const fullKey = parentKey ? `${parentKey}${sep}${key}` : key;
    if (isJsonObject(child)) {
      Object.assign(out, flattenObject(child, fullKey, sep));
    } else {
      out[fullKey] = child;
    }
  }
  return out;
}
