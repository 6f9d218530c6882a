import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

export async function createTempDir(prefix = 'fieldkit-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write an executable /bin/sh script and return its path.
 */
export async function writeScript(dir: string, name: string, body: string): Promise<string> {
    const scriptPath = path.join(dir, name);
    await fs.writeFile(scriptPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return scriptPath;
}
