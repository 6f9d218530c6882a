import type { PluginFactory } from '@fieldkit/core';
import { createPlugin as createHelloPlugin } from '@fieldkit/plugin-hello';

/**
 * Plugins compiled into the CLI. Registered before any scanned package, so a
 * built-in wins every name collision.
 */
export const BUILTIN_PLUGINS: Readonly<Record<string, PluginFactory>> = {
    hello: createHelloPlugin,
};
