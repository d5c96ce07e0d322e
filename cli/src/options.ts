import { InvalidArgumentError } from 'commander';
import { parseCsvList } from '@twinblocks/core';

/**
 * Builds a commander argument parser that accepts only whole numbers >= min.
 */
export function integerAtLeast(min: number): (value: string) => number {
  return (value: string) => {
    const trimmed = value.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
    }
    const parsed = Number(trimmed);
    if (!Number.isSafeInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}, got ${trimmed}.`);
    }
    return parsed;
  };
}

export function csvList(value: string): string[] {
  return parseCsvList(value);
}
