export { runCommand, type RunCommandOptions, type CommandResult } from './run-command.js';
export {
    killProcessTree,
    killTrackedProcessTrees,
    trackChildProcess,
    waitForExit,
    hasExited,
} from './kill-tree.js';
export { ProcessError, getErrnoCode } from './errors.js';
export { ProcessErrorCode } from './error-codes.js';
