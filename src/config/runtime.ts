import { InvalidArgumentError } from "commander";

/** commander argument parser for `--interval`, `--hours` and `--recent`. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || !Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }
  return n;
}

export function minutesToMs(minutes: number) {
  return minutes * 60 * 1000;
}
