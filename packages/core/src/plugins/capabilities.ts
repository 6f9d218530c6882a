/**
 * Capability descriptors → argument surface, coercion and schemas.
 *
 * One descriptor list feeds three consumers without modification: the CLI
 * argument surface, `coerceArguments`, and the zod / JSON schema used by
 * non-CLI front ends.
 */

import * as path from 'path';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { PluginError } from './errors.js';
import type { CapabilityDescriptor, CapabilityKind, CapabilityValue } from './schemas.js';
import type { ToolArgs } from './types.js';

const CAPABILITY_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/** Capability name that becomes a positional sub-command when it lists allowed values */
export const SUBCOMMAND_CAPABILITY = 'command';

export function matchesKind(value: unknown, kind: CapabilityKind): value is CapabilityValue {
    switch (kind) {
        case 'string':
        case 'path':
            return typeof value === 'string';
        case 'int':
            return typeof value === 'number' && Number.isSafeInteger(value);
        case 'float':
            return typeof value === 'number' && Number.isFinite(value);
        case 'bool':
            return typeof value === 'boolean';
    }
}

/**
 * Every invariant violation in the list, in declaration order. Empty when valid.
 */
export function findCapabilityViolations(list: readonly CapabilityDescriptor[]): string[] {
    const violations: string[] = [];
    const seen = new Set<string>();

    list.forEach((capability, index) => {
        const { name, kind } = capability;
        if (name.trim() === '') {
            violations.push(`capability at index ${index} has an empty name`);
            return;
        }
        if (!CAPABILITY_NAME_PATTERN.test(name)) {
            violations.push(`'${name}' may only contain letters, digits, '-' and '_'`);
        }
        if (seen.has(name)) {
            violations.push(`duplicate capability name '${name}'`);
        }
        seen.add(name);

        if (capability.required && capability.default !== undefined) {
            violations.push(`'${name}' is required but declares a default`);
        }
        if (capability.default !== undefined && !matchesKind(capability.default, kind)) {
            violations.push(
                `'${name}' default ${JSON.stringify(capability.default)} is not a valid ${kind}`
            );
        }

        const allowed = capability.allowedValues;
        if (allowed !== undefined) {
            if (kind === 'bool') {
                violations.push(`'${name}' is a bool and cannot declare allowed values`);
            } else if (allowed.length === 0) {
                violations.push(`'${name}' declares an empty allowed values list`);
            } else if (
                capability.default !== undefined &&
                !allowed.includes(String(capability.default))
            ) {
                violations.push(
                    `'${name}' default ${JSON.stringify(capability.default)} is not one of: ${allowed.join(', ')}`
                );
            }
        }
    });

    return violations;
}

/**
 * @throws {FieldkitRuntimeError} PluginErrorCode.LOAD_INVALID_CAPABILITIES listing every violation
 */
export function validateCapabilities(
    pluginName: string,
    list: readonly CapabilityDescriptor[]
): void {
    const violations = findCapabilityViolations(list);
    if (violations.length > 0) {
        throw PluginError.invalidCapabilities(pluginName, violations);
    }
}

/**
 * Transport-neutral description of one command-line argument.
 */
export interface ArgumentSpec {
    name: string;
    kind: CapabilityKind;
    /** `--dry-run` for capability `dry_run` */
    flag: string;
    /** `--no-<name>`, only for booleans that default to true */
    negatedFlag?: string;
    takesValue: boolean;
    description: string;
    required: boolean;
    defaultValue?: CapabilityValue;
    allowedValues?: readonly string[];
    /** Sub-command selector given without a flag */
    positional: boolean;
}

export function toFlagName(capabilityName: string): string {
    return capabilityName.replace(/_/g, '-');
}

export function isSubcommandCapability(capability: CapabilityDescriptor): boolean {
    return (
        capability.name === SUBCOMMAND_CAPABILITY &&
        capability.allowedValues !== undefined &&
        capability.allowedValues.length > 0
    );
}

export function buildArgumentSurface(list: readonly CapabilityDescriptor[]): ArgumentSpec[] {
    return list.map((capability) => {
        const flagName = toFlagName(capability.name);
        const spec: ArgumentSpec = {
            name: capability.name,
            kind: capability.kind,
            flag: `--${flagName}`,
            takesValue: capability.kind !== 'bool',
            description: capability.description,
            required: capability.required,
            positional: isSubcommandCapability(capability),
        };

        if (capability.kind === 'bool') {
            const enabledByDefault = capability.default === true;
            spec.defaultValue = enabledByDefault;
            if (enabledByDefault) {
                spec.negatedFlag = `--no-${flagName}`;
            }
        } else if (capability.default !== undefined) {
            spec.defaultValue = capability.default;
        }
        if (capability.allowedValues !== undefined) {
            spec.allowedValues = capability.allowedValues;
        }
        return spec;
    });
}

export type RawArguments = Readonly<Record<string, string | boolean | undefined>>;

const TRUE_STRINGS = new Set(['true', '1', 'yes', 'on']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'off']);

function coerceValue(capability: CapabilityDescriptor, raw: string | boolean): CapabilityValue {
    const { name, kind } = capability;

    if (kind === 'bool') {
        if (typeof raw === 'boolean') return raw;
        const normalized = raw.trim().toLowerCase();
        if (TRUE_STRINGS.has(normalized)) return true;
        if (FALSE_STRINGS.has(normalized)) return false;
        throw PluginError.invalidArgument(name, raw, 'expected true or false');
    }

    if (typeof raw === 'boolean') {
        throw PluginError.invalidArgument(name, raw, `expected a ${kind} value`);
    }

    switch (kind) {
        case 'string':
            return raw;
        case 'path':
            if (raw.trim() === '') {
                throw PluginError.invalidArgument(name, raw, 'expected a path');
            }
            return path.resolve(raw);
        case 'int': {
            const trimmed = raw.trim();
            const value = Number(trimmed);
            if (!/^[+-]?\d+$/.test(trimmed) || !Number.isSafeInteger(value)) {
                throw PluginError.invalidArgument(name, raw, 'expected an integer');
            }
            return value;
        }
        case 'float': {
            const trimmed = raw.trim();
            const value = Number(trimmed);
            if (trimmed === '' || !Number.isFinite(value)) {
                throw PluginError.invalidArgument(name, raw, 'expected a number');
            }
            return value;
        }
    }
}

/**
 * Coerce raw string/flag values into typed arguments.
 *
 * Keys of `raw` are capability names. Optional values without a default are
 * left out of the result; booleans are always present.
 *
 * @throws {FieldkitRuntimeError} USAGE-scoped error for unknown keys, missing
 *   required values, uncoercible values or values outside `allowedValues`
 */
export function coerceArguments(list: readonly CapabilityDescriptor[], raw: RawArguments): ToolArgs {
    const known = new Map(list.map((capability) => [capability.name, capability]));
    for (const [key, value] of Object.entries(raw)) {
        if (value !== undefined && !known.has(key)) {
            throw PluginError.unknownArgument(key, [...known.keys()]);
        }
    }

    const result: Record<string, CapabilityValue> = {};
    for (const capability of list) {
        const rawValue = Object.hasOwn(raw, capability.name) ? raw[capability.name] : undefined;

        if (rawValue === undefined) {
            if (capability.required) {
                throw PluginError.missingArgument(capability.name);
            }
            if (capability.default !== undefined) {
                result[capability.name] = capability.default;
            } else if (capability.kind === 'bool') {
                result[capability.name] = false;
            }
            continue;
        }

        const value = coerceValue(capability, rawValue);
        const allowed = capability.allowedValues;
        if (
            allowed !== undefined &&
            !allowed.includes(String(value)) &&
            !(typeof rawValue === 'string' && allowed.includes(rawValue))
        ) {
            throw PluginError.invalidArgument(
                capability.name,
                rawValue,
                `allowed values: ${allowed.join(', ')}`
            );
        }
        result[capability.name] = value;
    }

    return result;
}

function kindToZod(kind: CapabilityKind): z.ZodTypeAny {
    switch (kind) {
        case 'string':
        case 'path':
            return z.string();
        case 'int':
            return z.number().int();
        case 'float':
            return z.number();
        case 'bool':
            return z.boolean();
    }
}

/**
 * Zod schema for already-typed arguments, e.g. a JSON request body.
 */
export function capabilitiesToZodSchema(
    list: readonly CapabilityDescriptor[]
): z.ZodObject<Record<string, z.ZodTypeAny>> {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const capability of list) {
        let schema = kindToZod(capability.kind);
        const allowed = capability.allowedValues;
        if (allowed !== undefined) {
            schema = schema.refine((value: unknown) => allowed.includes(String(value)), {
                message: `Expected one of: ${allowed.join(', ')}`,
            });
        }
        if (capability.description) {
            schema = schema.describe(capability.description);
        }
        if (!capability.required) {
            if (capability.default !== undefined) {
                schema = schema.default(capability.default);
            } else if (capability.kind === 'bool') {
                schema = schema.default(false);
            } else {
                schema = schema.optional();
            }
        }
        shape[capability.name] = schema;
    }
    return z.object(shape).strict();
}

export function capabilitiesToJsonSchema(list: readonly CapabilityDescriptor[]) {
    return zodToJsonSchema(capabilitiesToZodSchema(list));
}
