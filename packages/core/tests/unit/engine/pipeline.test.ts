import { randomUUID } from 'node:crypto';
import { chmodSync, existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { validateConfig } from '../../../src/config/schema.js';
import type { ProjectConfigInput } from '../../../src/config/schema.js';
import { EventBus } from '../../../src/engine/event-bus.js';
import {
  buildOverridesFromConfig,
  runPipeline,
  skipRulesFromConfig,
  sourceReferenceFromConfig,
} from '../../../src/engine/pipeline.js';
import { resolvePaths } from '../../../src/config/paths.js';
import type { PipelineEvent } from '../../../src/types/events.js';
import { BuildFailedError } from '../../../src/utils/errors.js';
import { commandResult, createFakeRunner } from '../../helpers/fake-runner.js';

const SHA = 'c'.repeat(40);
const TESTS = ['test-backend-ops', 'test-grammar', 'test-tokenizer'];

let testDir: string;
let sdkRoot: string;
let sourceDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `accelbuild-pipeline-${randomUUID()}`);
  sdkRoot = join(testDir, 'rocm');
  sourceDir = join(testDir, 'llama.cpp');
  mkdirSync(join(sdkRoot, 'llvm', 'bin'), { recursive: true });
  writeFileSync(join(sdkRoot, 'llvm', 'bin', 'clang'), '');
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeTestBinaries(binDir: string): void {
  mkdirSync(binDir, { recursive: true });
  for (const name of TESTS) {
    writeFileSync(join(binDir, name), '');
    chmodSync(join(binDir, name), 0o755);
  }
}

interface HostOptions {
  targets?: string;
  failing?: string[];
  compileExit?: number;
  /** Directory the test binaries are expected to run from */
  binDir?: string;
}

/** Fake host: git, the SDK enumerator, cmake and the produced test binaries. */
function fakeHost(options: HostOptions = {}) {
  return createFakeRunner((command, args, runOptions) => {
    if (command === 'git') {
      switch (args[0]) {
        case 'init':
          mkdirSync(join(sourceDir, '.git'), { recursive: true });
          return commandResult(command, args, 0);
        case 'rev-parse':
          return commandResult(command, args, 0, `${SHA}\n`);
        case 'checkout':
          writeFileSync(join(sourceDir, 'CMakeLists.txt'), 'project(llama)\n');
          return commandResult(command, args, 0);
        default:
          return commandResult(command, args, 0);
      }
    }
    if (command.endsWith('rocm_agent_enumerator')) {
      return commandResult(command, args, 0, options.targets ?? 'gfx000\ngfx1030\n');
    }
    if (command === 'cmake') {
      if (args[0] === '--build') {
        if (options.compileExit) return commandResult(command, args, options.compileExit, 'ninja: build stopped\n');
        writeTestBinaries(join(args[1] ?? '', 'bin'));
      }
      return commandResult(command, args, 0);
    }
    expect(runOptions.cwd).toBe(options.binDir ?? join(sourceDir, 'build', 'bin'));
    const name = basename(command);
    return commandResult(command, args, options.failing?.includes(name) ? 1 : 0, `${name} output\n`);
  });
}

function config(input: ProjectConfigInput = {}) {
  return validateConfig({
    ...input,
    source: { path: sourceDir, url: 'https://example.test/llama.cpp.git', ...input.source },
    sdk: { root: sdkRoot, ...input.sdk },
  });
}

describe('config adapters', () => {
  it('maps nullable config fields to optional reference fields', () => {
    const cfg = config({ source: { depth: null, diffbaseTag: null } });
    const reference = sourceReferenceFromConfig(cfg, resolvePaths(cfg, testDir, {}));
    expect(reference).toEqual({
      url: 'https://example.test/llama.cpp.git',
      path: sourceDir,
      ref: 'amd-integration',
      depth: undefined,
      jobs: 10,
      diffbaseTag: undefined,
    });
  });

  it('leaves jobs to the orchestrator when set to auto', () => {
    const cfg = config();
    expect(buildOverridesFromConfig(cfg, resolvePaths(cfg, testDir, {})).jobs).toBeUndefined();
    const fixed = config({ build: { jobs: 6 } });
    expect(buildOverridesFromConfig(fixed, resolvePaths(fixed, testDir, {})).jobs).toBe(6);
  });

  it('builds the skip table from the test section', () => {
    const rules = skipRulesFromConfig(config({ test: { mode: 'smoke', useDefaultSkipRules: false } }));
    expect(rules.map((r) => r.id)).toEqual(['smoke-mode']);
  });
});

describe('runPipeline', () => {
  it('syncs, probes, builds and tests in order', async () => {
    const { runner, calls } = fakeHost({ failing: ['test-grammar'] });
    const bus = new EventBus();
    const events: PipelineEvent[] = [];
    bus.on('event', (e) => events.push(e));

    const result = await runPipeline(config({ build: { jobs: 4 } }), {
      projectDir: testDir,
      env: {},
      runner,
      bus,
      platform: 'linux',
    });

    expect(result.sync?.action).toBe('cloned');
    expect(result.context?.targets).toEqual(['gfx1030']);
    expect(result.build?.plan.configure.args).toContain('-DGPU_TARGETS=gfx1030');
    expect(result.tests && [result.tests.passed, result.tests.failed, result.tests.skipped]).toEqual([1, 1, 1]);
    expect(result.tests?.failures[0]).toEqual({
      name: 'test-grammar',
      exitCode: 1,
      signal: null,
      output: 'test-grammar output',
    });
    expect(result.exitCode).toBe(1);

    const firstOf = (type: PipelineEvent['type']) => events.findIndex((e) => e.type === type);
    expect(firstOf('sync.completed')).toBeLessThan(firstOf('probe.completed'));
    expect(firstOf('probe.completed')).toBeLessThan(firstOf('build.completed'));
    expect(firstOf('build.completed')).toBeLessThan(firstOf('test.discovered'));
    expect(calls.map((c) => basename(c.command))).not.toContain('test-backend-ops');
  });

  it('tests an existing build without syncing or building', async () => {
    writeTestBinaries(join(sourceDir, 'build', 'bin'));
    const { runner, calls } = fakeHost();

    const result = await runPipeline(config({ build: { targets: ['gfx1100'] } }), {
      projectDir: testDir,
      env: {},
      runner,
      skip: { sync: true, build: true },
      platform: 'linux',
    });

    expect(result.sync).toBeUndefined();
    expect(result.build).toBeUndefined();
    // backend-ops is only skipped on gfx1030
    expect(result.tests?.passed).toBe(3);
    expect(result.exitCode).toBe(0);
    expect(calls.map((c) => c.command).filter((c) => c === 'git' || c === 'cmake')).toEqual([]);
  });

  it('tests the binary directory named by LLAMACPP_BUILD_DIR', async () => {
    const outOfTree = join(testDir, 'out', 'build', 'bin');
    writeTestBinaries(outOfTree);
    const { runner } = fakeHost({ binDir: outOfTree });

    const result = await runPipeline(config({ build: { targets: ['gfx1100'] } }), {
      projectDir: testDir,
      env: { LLAMACPP_BUILD_DIR: outOfTree },
      runner,
      skip: { sync: true, build: true },
      platform: 'linux',
    });

    expect(result.paths.testBinDir).toBe(outOfTree);
    expect(result.tests?.total).toBe(3);
    expect(result.tests?.passed).toBe(3);
  });

  it('prefers an explicit test binary directory over LLAMACPP_BUILD_DIR', async () => {
    const stale = join(testDir, 'stale', 'bin');
    const fresh = join(testDir, 'fresh', 'bin');
    mkdirSync(stale, { recursive: true });
    writeFileSync(join(stale, 'test-stale'), '');
    chmodSync(join(stale, 'test-stale'), 0o755);
    writeTestBinaries(fresh);
    const { runner, calls } = fakeHost({ binDir: fresh });

    const result = await runPipeline(config({ build: { targets: ['gfx1100'] } }), {
      projectDir: testDir,
      env: { LLAMACPP_BUILD_DIR: stale },
      runner,
      testBinDir: fresh,
      skip: { sync: true, build: true },
      platform: 'linux',
    });

    expect(result.paths.testBinDir).toBe(fresh);
    expect(calls.map((c) => c.command)).toEqual(TESTS.map((name) => join(fresh, name)));
    expect(result.exitCode).toBe(0);
  });

  it('runs tests without scoped skips when no SDK is installed', async () => {
    writeTestBinaries(join(sourceDir, 'build', 'bin'));
    const { runner } = fakeHost();

    const result = await runPipeline(config({ sdk: { root: join(testDir, 'missing-rocm') } }), {
      projectDir: testDir,
      env: {},
      runner,
      skip: { sync: true, build: true },
      platform: 'linux',
    });

    expect(result.tests?.skipped).toBe(0);
    expect(result.tests?.passed).toBe(3);
  });

  it('stops after the build step when tests are skipped', async () => {
    const { runner, calls } = fakeHost();

    const result = await runPipeline(config(), {
      projectDir: testDir,
      env: {},
      runner,
      skip: { tests: true },
      platform: 'linux',
    });

    expect(result.build?.dryRun).toBe(false);
    expect(result.tests).toBeUndefined();
    expect(result.exitCode).toBe(0);
    expect(calls.some((c) => TESTS.includes(basename(c.command)))).toBe(false);
  });

  it('plans without building or testing on a dry run', async () => {
    const { runner, calls } = fakeHost();

    const result = await runPipeline(config(), {
      projectDir: testDir,
      env: {},
      runner,
      dryRun: true,
      platform: 'linux',
    });

    expect(result.build?.dryRun).toBe(true);
    expect(result.tests).toBeUndefined();
    expect(calls.some((c) => c.command === 'cmake')).toBe(false);
    expect(existsSync(join(sourceDir, 'build'))).toBe(false);
  });

  it('propagates a build failure and runs no tests', async () => {
    const { runner, calls } = fakeHost({ compileExit: 2 });

    await expect(
      runPipeline(config(), { projectDir: testDir, env: {}, runner, platform: 'linux' }),
    ).rejects.toBeInstanceOf(BuildFailedError);
    expect(calls.some((c) => TESTS.includes(basename(c.command)))).toBe(false);
  });
});
