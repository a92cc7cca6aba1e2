// packages/cli/src/program.ts — Command registration

import { VERSION } from '@accelbuild/core';
import { Command, Option } from 'commander';

import { buildCommand } from './commands/build.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { pipelineCommand } from './commands/pipeline.js';
import { probeCommand } from './commands/probe.js';
import { syncCommand } from './commands/sync.js';
import { testCommand } from './commands/test.js';
import { parsePositiveInt, parseTargetList } from './options.js';
import { action } from './utils.js';

const BUILD_TYPES = ['Release', 'Debug', 'RelWithDebInfo', 'MinSizeRel'];
const TEST_MODES = ['full', 'smoke'];

function addSyncOptions(cmd: Command, jobsFlag: string): Command {
  return cmd
    .option('--path <dir>', 'Local working tree')
    .option('--ref <ref>', 'Branch, tag or commit to check out')
    .option('--url <url>', 'Remote repository URL')
    .option('--depth <n>', 'Shallow fetch depth', parsePositiveInt('Depth'))
    .option('--full-history', 'Fetch full history instead of a shallow clone')
    .option(jobsFlag, 'Parallel fetch jobs', parsePositiveInt('Fetch jobs'))
    .option('--force', 'Discard local modifications in the working tree')
    .option('--no-tag', 'Do not tag the synced commit');
}

function addBuildOptions(cmd: Command): Command {
  return cmd
    .option('--sdk-root <dir>', 'Accelerator SDK root (default: discovered)')
    .option('--build-dir <dir>', 'Build output directory (default: <source>/build)')
    .addOption(new Option('--build-type <type>', 'CMake build type').choices(BUILD_TYPES))
    .option('--targets <list>', 'Hardware targets, comma separated (default: detected)', parseTargetList)
    .option('--jobs <n>', 'Parallel compile jobs (default: CPU count)', parsePositiveInt('Jobs'))
    .option('--curl', 'Enable HTTP transfer support')
    .option('--openssl', 'Enable TLS via OpenSSL')
    .option('--llguidance', 'Enable constrained decoding')
    .option('--clean', 'Delete the build directory before configuring')
    .option('--dry-run', 'Print the build commands without running them');
}

function addTestOptions(cmd: Command): Command {
  return cmd
    .option('--log-file <file>', 'Write combined test output to this file')
    .addOption(new Option('--mode <mode>', 'Test selection (default: TEST_TYPE or full)').choices(TEST_MODES))
    .option('--timeout <seconds>', 'Per-test timeout in seconds', parsePositiveInt('Timeout'));
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('accelbuild')
    .description('Sync, build and test llama.cpp against the installed ROCm SDK')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging and stream build output')
    .option('--config <file>', 'Config file (default: .accelbuild.yml)');

  program
    .command('init')
    .description('Write a default .accelbuild.yml in the current directory')
    .option('--force', 'Overwrite an existing .accelbuild.yml')
    .action(action(initCommand));

  addSyncOptions(
    program.command('sync').description('Fetch the source tree and check out the configured ref'),
    '--jobs <n>',
  )
    .option('--json', 'Print the sync result as JSON')
    .action(action(syncCommand));

  program
    .command('probe')
    .description('Detect the accelerator SDK and hardware targets')
    .option('--sdk-root <dir>', 'Accelerator SDK root (default: discovered)')
    .option('--fallback-target <target>', 'Target used when none are detected')
    .option('--json', 'Print the accelerator context as JSON')
    .action(action(probeCommand));

  addBuildOptions(program.command('build').description('Configure and compile with CMake'))
    .option('--source-dir <dir>', 'Source tree (default: config source.path)')
    .option('--json', 'Print the build result as JSON')
    .action(action(buildCommand));

  addTestOptions(program.command('test').description('Run the built test binaries'))
    .option('--build-dir <dir>', 'Build output directory whose bin/ is tested (default: LLAMACPP_BUILD_DIR as the binary directory, else <source>/build)')
    .option('--targets <list>', 'Targets for skip rules (default: detected)', parseTargetList)
    .option('--json', 'Print the run summary as JSON')
    .action(action(testCommand));

  const pipeline = program.command('pipeline').description('Sync, build and test in one run');
  addSyncOptions(pipeline, '--fetch-jobs <n>');
  addBuildOptions(pipeline);
  addTestOptions(pipeline)
    .option('--skip-sync', 'Use the source tree as it is')
    .option('--skip-build', 'Test an existing build')
    .option('--skip-tests', 'Stop after the build')
    .option('--json', 'Print the pipeline result as JSON')
    .action(action(pipelineCommand));

  program
    .command('doctor')
    .description('Preflight diagnostics: git, cmake, SDK, targets, node, config')
    .action(action(doctorCommand));

  return program;
}
