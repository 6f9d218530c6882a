import * as path from 'path';
import { promises as fs, constants } from 'fs';

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
    try {
        const stat = await fs.stat(candidate);
        if (!stat.isFile()) return false;
        if (platform === 'win32') return true;
        await fs.access(candidate, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Locate an executable on PATH.
 * @returns absolute path of the first match, or null
 */
export async function findOnPath(
    binary: string,
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform
): Promise<string | null> {
    const searchPath = env.PATH ?? env.Path ?? '';
    const extensions =
        platform === 'win32'
            ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
            : [''];

    for (const dir of searchPath.split(path.delimiter)) {
        if (dir.trim() === '') continue;
        for (const extension of extensions) {
            const candidate = path.join(dir, binary + extension);
            if (await isExecutableFile(candidate, platform)) {
                return path.resolve(candidate);
            }
        }
    }
    return null;
}
