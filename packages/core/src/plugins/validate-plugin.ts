/**
 * Structural conformance check performed once at registration.
 *
 * Plugins share no base class; anything whose shape satisfies the contract is
 * accepted, anything else is rejected with the list of problems.
 */

import { z } from 'zod';
import { PluginError } from './errors.js';
import { findCapabilityViolations } from './capabilities.js';
import { CapabilityDescriptorSchema, type PluginDescriptor } from './schemas.js';
import type { ToolPlugin } from './types.js';
import { formatZodIssues } from '../errors/zod-issues.js';
import { toErrorMessage } from '../errors/runtime-error.js';

const isFunction = (value: unknown) => typeof value === 'function';

const ToolPluginShapeSchema = z.object({
    name: z.string().min(1),
    description: z.string(),
    version: z.string().min(1),
    requiresAuth: z.boolean(),
    getCapabilities: z.custom<ToolPlugin['getCapabilities']>(isFunction, 'must be a function'),
    run: z.custom<ToolPlugin['run']>(isFunction, 'must be a function'),
});

const CapabilityListSchema = z.array(CapabilityDescriptorSchema);

export function isToolPlugin(value: unknown): value is ToolPlugin {
    return ToolPluginShapeSchema.safeParse(value).success;
}

export interface ValidatedPlugin {
    plugin: ToolPlugin;
    descriptor: PluginDescriptor;
}

/**
 * Check shape and capability invariants, returning the plugin with its
 * normalized descriptor.
 *
 * @throws {FieldkitRuntimeError} LOAD_INVALID_SHAPE or LOAD_INVALID_CAPABILITIES
 */
export function validateToolPlugin(candidate: unknown, origin: string): ValidatedPlugin {
    if (!isToolPlugin(candidate)) {
        const shape = ToolPluginShapeSchema.safeParse(candidate);
        const problems = shape.success ? [] : formatZodIssues(shape.error.issues);
        throw PluginError.invalidShape(origin, problems);
    }

    let rawCapabilities: unknown;
    try {
        rawCapabilities = candidate.getCapabilities();
    } catch (error) {
        throw PluginError.invalidShape(origin, [`getCapabilities threw: ${toErrorMessage(error)}`]);
    }

    const parsed = CapabilityListSchema.safeParse(rawCapabilities);
    if (!parsed.success) {
        throw PluginError.invalidCapabilities(candidate.name, formatZodIssues(parsed.error.issues));
    }

    const violations = findCapabilityViolations(parsed.data);
    if (violations.length > 0) {
        throw PluginError.invalidCapabilities(candidate.name, violations);
    }

    return {
        plugin: candidate,
        descriptor: {
            name: candidate.name,
            description: candidate.description,
            version: candidate.version,
            requiresAuth: candidate.requiresAuth,
            capabilities: parsed.data,
        },
    };
}
