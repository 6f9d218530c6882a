import * as path from 'path';
import { homedir } from 'os';

/**
 * Root of all user state. `FIELDKIT_HOME` overrides the default `~/.fieldkit`.
 */
export function getFieldkitHome(): string {
    const override = process.env.FIELDKIT_HOME;
    return override && override.trim() !== '' ? path.resolve(override) : path.join(homedir(), '.fieldkit');
}

/**
 * Standard path resolver for logs, plugins, config and caches.
 * @param type Sub-directory under the fieldkit home (logs, plugins, ...)
 * @param filename Optional filename to append
 */
export function getFieldkitPath(type: string, filename?: string): string {
    const basePath = path.join(getFieldkitHome(), type);
    return filename ? path.join(basePath, filename) : basePath;
}

export function getConfigFilePath(): string {
    return path.join(getFieldkitHome(), 'config.yaml');
}

export function getDefaultLogFilePath(): string {
    return getFieldkitPath('logs', 'fieldkit.log');
}

/** Directory that owns installed plugins (native packages, binaries, cache) */
export function getPluginHome(): string {
    return getFieldkitPath('plugins');
}

export function getIntrospectionCachePath(): string {
    return getFieldkitPath('plugins', 'process-plugins.json');
}

/**
 * `node_modules` roots scanned for native plugin packages: the plugin home's
 * npm prefix first, then every entry of `FIELDKIT_PLUGIN_PATH` (path-delimited).
 */
export function getNativePluginRoots(): string[] {
    const roots = [path.join(getPluginHome(), 'native', 'node_modules')];
    const extra = process.env.FIELDKIT_PLUGIN_PATH;
    if (extra) {
        for (const entry of extra.split(path.delimiter)) {
            if (entry.trim() !== '') {
                roots.push(path.resolve(entry.trim()));
            }
        }
    }
    return roots;
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(p: string): string {
    if (p === '~') return homedir();
    if (p.startsWith('~/')) return path.join(homedir(), p.slice(2));
    return p;
}
