const freezeValue = (value: unknown): void => {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return;
  }
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) freezeValue(child);
};

/**
 * Recursively freezes plain objects and arrays and returns the same value.
 */
export const deepFreeze = <T>(value: T): T => {
  freezeValue(value);
  return value;
};
