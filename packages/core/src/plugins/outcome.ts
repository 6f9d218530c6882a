import { RunOutcomeSchema, type RunStatus } from './schemas.js';
import type { RunOutcome } from './types.js';
import { formatZodIssues } from '../errors/zod-issues.js';

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Build an immutable outcome. `data` must be JSON-serializable.
 */
export function createRunOutcome(
    status: RunStatus,
    summary: string,
    data: Record<string, unknown> = {},
    artifacts: Record<string, string> = {}
): RunOutcome {
    return deepFreeze({
        status,
        summary,
        data: { ...data },
        artifacts: { ...artifacts },
    });
}

export function failureOutcome(summary: string, data: Record<string, unknown> = {}): RunOutcome {
    return createRunOutcome('failure', summary, data);
}

export function cancelledOutcome(summary = 'Cancelled', data: Record<string, unknown> = {}): RunOutcome {
    return createRunOutcome('cancelled', summary, data);
}

export type ParsedOutcome =
    | { ok: true; outcome: RunOutcome }
    | { ok: false; problems: string[] };

/**
 * Validate an untrusted value (a plugin return value, a JSON line) as a RunOutcome.
 */
export function parseRunOutcome(value: unknown): ParsedOutcome {
    const result = RunOutcomeSchema.safeParse(value);
    if (!result.success) {
        return { ok: false, problems: formatZodIssues(result.error.issues) };
    }
    const { status, summary, data, artifacts } = result.data;
    return { ok: true, outcome: createRunOutcome(status, summary, data, artifacts) };
}
