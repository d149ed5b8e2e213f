//a thin layer over `throw new Error(...)` so call sites stay one-liners

export const definedOrThrow = <const T>(value: T | undefined, errorMessage?: string): T => {
  if (value === undefined)
    throw new Error(errorMessage ?? "Value is undefined");
  return value;
};

export const isNatural = (value: unknown): value is number =>
  typeof value === "number" && Number.isSafeInteger(value) && value >= 0;

export function assertNatural(value: unknown, what: string = "Value"): asserts value is number {
  if (!isNatural(value))
    throw new Error(`${what} must be a non-negative safe integer, got ${String(value)}`);
}

export function assertAtMost(value: number, max: number, message?: string) {
  if (value > max)
    throw new Error(message ?? `Expected ${value} to be at most ${max}`);
}
