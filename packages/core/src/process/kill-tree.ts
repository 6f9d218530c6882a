import { spawn, type ChildProcess } from 'child_process';

export function hasExited(child: ChildProcess): boolean {
    return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Resolves true once the child has exited, or false after `timeoutMs`.
 */
export function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
    if (hasExited(child)) {
        return Promise.resolve(true);
    }
    return new Promise((resolve) => {
        const onExit = () => {
            clearTimeout(timer);
            resolve(true);
        };
        const timer = setTimeout(() => {
            child.removeListener('exit', onExit);
            resolve(false);
        }, timeoutMs);
        child.once('exit', onExit);
    });
}

function signalTree(child: ChildProcess, pid: number, signal: NodeJS.Signals): void {
    try {
        // Negative pid addresses the process group created by `detached: true`
        process.kill(-pid, signal);
    } catch {
        if (!hasExited(child)) {
            child.kill(signal);
        }
    }
}

/**
 * Terminate a child and everything it spawned: SIGTERM to the process group,
 * wait up to `graceMs`, then SIGKILL. On Windows, `taskkill /t /f`.
 *
 * The child must have been spawned with `detached: true` on Unix.
 */
export async function killProcessTree(child: ChildProcess, graceMs: number): Promise<void> {
    const pid = child.pid;
    if (pid === undefined) {
        return;
    }

    if (process.platform === 'win32') {
        await new Promise<void>((resolve) => {
            const killer = spawn('taskkill', ['/pid', String(pid), '/f', '/t'], {
                stdio: 'ignore',
            });
            killer.once('exit', () => resolve());
            killer.once('error', () => resolve());
        });
        return;
    }

    if (!hasExited(child)) {
        signalTree(child, pid, 'SIGTERM');
        await waitForExit(child, graceMs);
    }
    // Stragglers in the group that ignored SIGTERM
    signalTree(child, pid, 'SIGKILL');
}

const trackedChildren = new Set<ChildProcess>();

/**
 * Register a detached child so `killTrackedProcessTrees` can reach it. The
 * entry is dropped when the child exits.
 */
export function trackChildProcess(child: ChildProcess): void {
    if (child.pid === undefined || hasExited(child)) return;
    trackedChildren.add(child);
    child.once('exit', () => trackedChildren.delete(child));
}

/**
 * SIGKILL the process group of every tracked child, synchronously, for use
 * right before the parent exits. Returns how many trees were signalled.
 */
export function killTrackedProcessTrees(): number {
    let signalled = 0;
    for (const child of trackedChildren) {
        const pid = child.pid;
        if (pid === undefined || hasExited(child)) continue;
        if (process.platform === 'win32') {
            child.kill('SIGKILL');
        } else {
            signalTree(child, pid, 'SIGKILL');
        }
        signalled++;
    }
    trackedChildren.clear();
    return signalled;
}
