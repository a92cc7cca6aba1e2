import type { CommandResult, CommandRunner, RunCommandOptions } from '../../src/exec/process-runner.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunCommandOptions;
}

export function commandResult(
  command: string,
  args: readonly string[],
  exitCode: number | null,
  output = '',
  extra: Partial<CommandResult> = {},
): CommandResult {
  return {
    command,
    args,
    exitCode,
    signal: null,
    output,
    truncated: false,
    timedOut: false,
    durationMs: 5,
    ...extra,
  };
}

/**
 * CommandRunner stand-in that records every call and answers through a
 * handler. Handlers may throw to simulate a spawn failure.
 */
export function createFakeRunner(
  handler: (command: string, args: string[], options: RunCommandOptions) => CommandResult,
): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options = {}) => {
    const copy = [...args];
    calls.push({ command, args: copy, options });
    return handler(command, copy, options);
  };
  return { runner, calls };
}
