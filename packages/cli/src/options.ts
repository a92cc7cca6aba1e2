// packages/cli/src/options.ts — Argument parsers shared by commands

import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(label: string): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value)) throw new InvalidArgumentError(`${label} must be a positive integer`);
    const n = Number.parseInt(value, 10);
    if (n <= 0) throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };
}

/** Comma- or semicolon-separated hardware targets, e.g. `gfx1100,gfx1030`. */
export function parseTargetList(value: string): string[] {
  const targets = value
    .split(/[,;]/)
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
  if (targets.length === 0) throw new InvalidArgumentError('At least one target is required');
  for (const target of targets) {
    if (!/^[A-Za-z0-9_:+-]+$/.test(target)) {
      throw new InvalidArgumentError(`Invalid hardware target: ${target}`);
    }
  }
  return [...new Set(targets)];
}
