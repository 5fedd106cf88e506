// Freezes a value and everything reachable from it
export const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
};
