import { describe, expect, it } from 'vitest';
import type { Command } from 'commander';

import { createProgram } from '../src/program.js';

function findCommand(name: string): Command | undefined {
  return createProgram().commands.find((c) => c.name() === name);
}

function longFlags(name: string): (string | undefined)[] {
  return findCommand(name)?.options.map((o) => o.long) ?? [];
}

describe('accelbuild program', () => {
  it('registers every command', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      'init',
      'sync',
      'probe',
      'build',
      'test',
      'pipeline',
      'doctor',
    ]);
  });

  it('declares the global options on the root', () => {
    const flags = createProgram().options.map((o) => o.long);
    expect(flags).toContain('--verbose');
    expect(flags).toContain('--config');
  });

  it('gives sync its fetch options', () => {
    expect(longFlags('sync')).toEqual([
      '--path',
      '--ref',
      '--url',
      '--depth',
      '--full-history',
      '--jobs',
      '--force',
      '--no-tag',
      '--json',
    ]);
  });

  it('restricts build type and test mode to known values', () => {
    const buildType = findCommand('build')?.options.find((o) => o.long === '--build-type');
    expect(buildType?.argChoices).toEqual(['Release', 'Debug', 'RelWithDebInfo', 'MinSizeRel']);
    const mode = findCommand('test')?.options.find((o) => o.long === '--mode');
    expect(mode?.argChoices).toEqual(['full', 'smoke']);
  });

  it('keeps fetch jobs and compile jobs apart on pipeline', () => {
    const flags = longFlags('pipeline');
    expect(flags).toContain('--fetch-jobs');
    expect(flags).toContain('--jobs');
    expect(flags).toContain('--skip-sync');
    expect(flags).toContain('--skip-build');
    expect(flags).toContain('--skip-tests');
    expect(flags).toContain('--dry-run');
    expect(flags).toContain('--mode');
  });

  it('lets test override the build directory and targets', () => {
    const flags = longFlags('test');
    expect(flags).toContain('--build-dir');
    expect(flags).toContain('--targets');
    expect(flags).toContain('--log-file');
    expect(flags).toContain('--timeout');
  });
});
