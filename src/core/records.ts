/**
 * Empty string-keyed record without a prototype. Captured names such as
 * `constructor` or `__proto__` stay ordinary keys.
 */
export function createRecord<T>(): Record<string, T> {
  return Object.create(null);
}

/**
 * Own property lookup; inherited members never match
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
