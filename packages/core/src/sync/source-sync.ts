// packages/core/src/sync/source-sync.ts — Converge a local working tree onto a pinned remote ref

import { existsSync, mkdirSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { EventBus } from '../engine/event-bus.js';
import { formatCommand, runCommand, type CommandResult, type CommandRunner } from '../exec/process-runner.js';
import type { SourceReference, SyncAction, SyncResult } from '../types/source.js';
import { DirtyWorkingTreeError, FetchError, SpawnError, type SyncStep } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { tailLines } from '../utils/text.js';

export type WorkingTreeState = 'missing' | 'empty' | 'repository' | 'foreign';

export interface SourceSyncOptions {
  runner?: CommandRunner;
  logger?: Logger;
  bus?: EventBus;
  /** Discard tracked local modifications instead of failing. */
  force?: boolean;
  /** git executable */
  git?: string;
}

export function inspectWorkingTree(path: string): WorkingTreeState {
  if (!existsSync(path)) return 'missing';
  if (!statSync(path).isDirectory()) return 'foreign';
  if (existsSync(join(path, '.git'))) return 'repository';
  return readdirSync(path).length === 0 ? 'empty' : 'foreign';
}

function validateReference(reference: SourceReference): void {
  if (!reference.url.trim()) throw new FetchError('Remote URL is empty', 'inspect');
  if (!reference.ref.trim()) throw new FetchError('Ref to check out is empty', 'inspect');
  if (reference.depth !== undefined && (!Number.isInteger(reference.depth) || reference.depth < 1)) {
    throw new FetchError(`Fetch depth must be a positive integer, got ${reference.depth}`, 'inspect');
  }
  if (!Number.isInteger(reference.jobs) || reference.jobs < 1) {
    throw new FetchError(`Fetch jobs must be a positive integer, got ${reference.jobs}`, 'inspect');
  }
}

/**
 * Brings `reference.path` to exactly `reference.ref` of `reference.url`.
 *
 * A fresh directory is initialised and fetched at the configured depth; an
 * existing checkout is re-pointed at the remote, fetched and checked out at
 * FETCH_HEAD. When HEAD already equals the fetched commit the checkout is
 * skipped, so re-running converges without touching the tree.
 *
 * Tracked local modifications fail the sync with DirtyWorkingTreeError
 * unless `force` is set, in which case they are discarded with a warning.
 */
export class SourceSync {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly bus?: EventBus;
  private readonly force: boolean;
  private readonly gitBin: string;

  constructor(options: SourceSyncOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
    this.bus = options.bus;
    this.force = options.force ?? false;
    this.gitBin = options.git ?? 'git';
  }

  async sync(reference: SourceReference): Promise<SyncResult> {
    validateReference(reference);
    const { path, url, ref } = reference;
    this.bus?.emitEvent({ type: 'sync.started', url, path, ref });

    const state = inspectWorkingTree(path);
    if (state === 'foreign') {
      throw new FetchError(`${path} exists but is not a git working tree`, 'inspect');
    }

    const fresh = state !== 'repository';
    let previousRevision: string | undefined;
    let discardChanges = false;

    if (fresh) {
      this.logger.info(`Initialising repository at ${path} for ${ref}`);
      mkdirSync(path, { recursive: true });
      await this.gitOrThrow(path, ['init', '--initial-branch=main'], 'init');
      await this.gitOrThrow(path, ['config', 'advice.detachedHead', 'false'], 'init');
      await this.gitOrThrow(path, ['remote', 'add', 'origin', url], 'remote');
    } else {
      this.logger.info(`Reusing repository at ${path}`);
      await this.pointOriginAt(path, url);
      const modified = await this.modifiedFiles(path);
      if (modified.length > 0) {
        if (!this.force) throw new DirtyWorkingTreeError(path, modified);
        this.logger.warn(`Discarding local modifications in ${path}: ${modified.join(', ')}`);
        discardChanges = true;
      }
      previousRevision = await this.revParse(path, 'HEAD');
    }

    const fetchArgs = ['fetch'];
    if (reference.depth !== undefined) fetchArgs.push('--depth', String(reference.depth));
    fetchArgs.push('-j', String(reference.jobs), 'origin', ref);
    await this.gitOrThrow(path, fetchArgs, 'fetch');

    const fetched = await this.revParse(path, 'FETCH_HEAD');
    if (!fetched) {
      throw new FetchError(`Could not resolve ${ref} from ${url}`, 'fetch');
    }

    let action: SyncAction;
    if (previousRevision === fetched && !discardChanges) {
      this.logger.info(`Already at ${fetched.slice(0, 12)} (${ref}); skipping checkout`);
      action = 'unchanged';
    } else {
      const checkoutArgs = discardChanges ? ['checkout', '--force', 'FETCH_HEAD'] : ['checkout', 'FETCH_HEAD'];
      await this.gitOrThrow(path, checkoutArgs, 'checkout');
      action = fresh ? 'cloned' : 'updated';
    }

    if (reference.diffbaseTag) {
      await this.gitOrThrow(path, ['tag', '-f', reference.diffbaseTag, '--no-sign'], 'tag');
    }

    const head = await this.revParse(path, 'HEAD');
    if (head !== fetched) {
      throw new FetchError(
        `HEAD is ${head ?? 'unresolved'} after checkout, expected ${fetched}`,
        'verify',
      );
    }

    this.logger.info(`${path} at ${fetched.slice(0, 12)} (${action})`);
    this.bus?.emitEvent({ type: 'sync.completed', path, revision: fetched, action });
    return { path, ref, revision: fetched, previousRevision, action };
  }

  private async pointOriginAt(path: string, url: string): Promise<void> {
    const current = await this.git(path, ['remote', 'get-url', 'origin'], 'remote');
    if (current.exitCode !== 0) {
      await this.gitOrThrow(path, ['remote', 'add', 'origin', url], 'remote');
    } else if (current.output.trim() !== url) {
      await this.gitOrThrow(path, ['remote', 'set-url', 'origin', url], 'remote');
    }
  }

  /** Tracked files with local changes; untracked files never count. */
  private async modifiedFiles(path: string): Promise<string[]> {
    const result = await this.gitOrThrow(path, ['status', '--porcelain', '--untracked-files=no'], 'status');
    return result.output
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => line.slice(3).trim());
  }

  private async revParse(path: string, rev: string): Promise<string | undefined> {
    const result = await this.git(path, ['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], 'verify');
    if (result.exitCode !== 0) return undefined;
    const sha = result.output.trim();
    return sha.length > 0 ? sha : undefined;
  }

  private async git(cwd: string, args: string[], step: SyncStep): Promise<CommandResult> {
    this.logger.debug(`++ Exec [${cwd}]$ ${formatCommand(this.gitBin, args)}`);
    try {
      return await this.runner(this.gitBin, args, {
        cwd,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
    } catch (err) {
      if (err instanceof SpawnError) {
        throw new FetchError(`git is not available: ${err.message}`, step);
      }
      throw err;
    }
  }

  private async gitOrThrow(cwd: string, args: string[], step: SyncStep): Promise<CommandResult> {
    const result = await this.git(cwd, args, step);
    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit ${result.exitCode}`;
      throw new FetchError(
        `git ${args[0]} failed in ${cwd} (${status})`,
        step,
        tailLines(result.output, 20),
      );
    }
    return result;
  }
}
