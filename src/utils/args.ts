import { InvalidArgumentError } from 'commander';

// Commander option parser for counts such as --max
export function nonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError('Expected a non-negative integer.');
  return parseInt(value, 10);
}
