/**
 * JSON encoding of ledger state. Amounts are bigints and the ledgers keep
 * Maps and Sets, none of which JSON carries, so they travel tagged:
 * `{ "$bigint": "12" }`, `{ "$map": [[k, v], ...] }`, `{ "$set": [...] }`.
 */

function encode(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return { $bigint: value.toString() };
  if (value instanceof Map) return { $map: [...value.entries()] };
  if (value instanceof Set) return { $set: [...value.values()] };
  return value;
}

function decode(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  if ('$bigint' in value && typeof value.$bigint === 'string') {
    return BigInt(value.$bigint);
  }
  if ('$map' in value && Array.isArray(value.$map)) {
    return new Map(
      value.$map.filter(
        (entry): entry is [unknown, unknown] =>
          Array.isArray(entry) && entry.length === 2,
      ),
    );
  }
  if ('$set' in value && Array.isArray(value.$set)) {
    return new Set(value.$set);
  }
  return value;
}

export function stringifyLedger(value: unknown): string {
  return JSON.stringify(value, encode);
}

export function parseLedger<T>(text: string): T {
  return JSON.parse(text, decode);
}

/** Wire form of a value: every bigint becomes its decimal string. */
export type Wire<T> = T extends bigint
  ? string
  : T extends readonly (infer U)[]
    ? Wire<U>[]
    : T extends object
      ? { [K in keyof T]: Wire<T[K]> }
      : T;

export function toWire<T>(value: T): Wire<T> {
  return JSON.parse(
    JSON.stringify(value, (_key, v: unknown) =>
      typeof v === 'bigint' ? v.toString() : v,
    ),
  );
}
