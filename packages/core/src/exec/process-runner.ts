// packages/core/src/exec/process-runner.ts — Subprocess execution with combined output capture

import { spawn } from 'node:child_process';
import { KILL_GRACE_MS, MAX_CAPTURE_CHARS } from '../utils/constants.js';
import { SpawnError } from '../utils/errors.js';

/** Progress callbacks for real-time feedback while a command runs. */
export interface RunCallbacks {
  /** Called when the subprocess successfully spawns. */
  onSpawn?: (pid: number, command: string) => void;
  /** Called on each stdout or stderr chunk, in arrival order. */
  onOutput?: (chunk: string) => void;
}

export interface RunCommandOptions extends RunCallbacks {
  cwd?: string;
  /** Full environment for the child. Defaults to the parent's. */
  env?: NodeJS.ProcessEnv;
  /** Terminate the process after this many ms. Unset means no limit. */
  timeoutMs?: number;
  /** Keep at most this many trailing characters of combined output. */
  maxOutputChars?: number;
}

export interface CommandResult {
  command: string;
  args: readonly string[];
  /** Null when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Interleaved stdout + stderr. */
  output: string;
  truncated: boolean;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Runs a command to completion. Resolves for every exit status; rejects
 * with SpawnError only when the process could not be started.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();
    const maxChars = options.maxOutputChars ?? MAX_CAPTURE_CHARS;

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let output = '';
    let truncated = false;
    let timedOut = false;
    let settled = false;
    let exited = false;

    const append = (data: Buffer) => {
      const chunk = data.toString();
      output += chunk;
      if (output.length > maxChars) {
        output = output.slice(-maxChars);
        truncated = true;
      }
      try { options.onOutput?.(chunk); } catch { /* callback error isolation */ }
    };

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          // Escalate if SIGTERM is ignored
          setTimeout(() => {
            if (!exited) child.kill('SIGKILL');
          }, KILL_GRACE_MS).unref();
        }, options.timeoutMs)
      : undefined;

    child.on('spawn', () => {
      try { options.onSpawn?.(child.pid ?? 0, command); } catch { /* callback error isolation */ }
    });

    child.stdout.on('data', append);
    child.stderr.on('data', append);

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      reject(new SpawnError(`Failed to start ${command}: ${err.message}`, command, err.code));
    });

    child.on('exit', () => {
      exited = true;
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        command,
        args,
        exitCode: code,
        signal,
        output,
        truncated,
        timedOut,
        durationMs: Date.now() - startTime,
      });
    });
  });
};

/** Render a command line for logs. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}
