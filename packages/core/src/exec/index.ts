// packages/core/src/exec/index.ts -- barrel re-export

export { runCommand, formatCommand } from './process-runner.js';
export type { CommandRunner, CommandResult, RunCommandOptions, RunCallbacks } from './process-runner.js';
