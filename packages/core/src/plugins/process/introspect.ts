import { runCommand } from '../../process/run-command.js';
import { ProcessError } from '../../process/errors.js';
import { DEFAULT_INTROSPECT_TIMEOUT_MS } from '../../config/schemas.js';
import { formatZodIssues } from '../../errors/zod-issues.js';
import { findCapabilityViolations } from '../capabilities.js';
import type { PluginDescriptor } from '../schemas.js';
import {
    INTROSPECT_FLAG,
    WireDescriptorSchema,
    tryParseJson,
    wireToDescriptor,
    type WireDescriptor,
} from './protocol.js';

export interface IntrospectionResult {
    introspection: WireDescriptor;
    descriptor: PluginDescriptor;
}

/**
 * Run `<binary> --introspect` once and validate the descriptor it prints.
 * Called at install time only.
 *
 * @throws {FieldkitRuntimeError} PROCESS_INTROSPECTION_FAILED, or a spawn error
 */
export async function introspectBinary(
    binaryPath: string,
    timeoutMs: number = DEFAULT_INTROSPECT_TIMEOUT_MS
): Promise<IntrospectionResult> {
    const result = await runCommand(binaryPath, [INTROSPECT_FLAG], { timeoutMs });

    if (result.timedOut) {
        throw ProcessError.introspectionFailed(binaryPath, `no response within ${timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
        const detail = result.stderr.trim();
        throw ProcessError.introspectionFailed(
            binaryPath,
            `exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`
        );
    }

    const raw = tryParseJson(result.stdout);
    if (raw === undefined) {
        throw ProcessError.introspectionFailed(binaryPath, 'stdout is not a single JSON object');
    }

    const parsed = WireDescriptorSchema.safeParse(raw);
    if (!parsed.success) {
        throw ProcessError.introspectionFailed(
            binaryPath,
            formatZodIssues(parsed.error.issues).join('; ')
        );
    }

    const descriptor = wireToDescriptor(parsed.data);
    const violations = findCapabilityViolations(descriptor.capabilities);
    if (violations.length > 0) {
        throw ProcessError.introspectionFailed(binaryPath, violations.join('; '));
    }

    return { introspection: parsed.data, descriptor };
}
