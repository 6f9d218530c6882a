import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error carrying a machine-readable code, the domain that raised it,
 * and an optional recovery hint shown to the user.
 */
export class FieldkitRuntimeError<C = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
        this.name = 'FieldkitRuntimeError';
    }

    toJSON() {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
        };
    }
}

/**
 * Usage errors are raised before any plugin code runs: unknown plugin name,
 * missing or invalid arguments.
 */
export function isUsageError(error: unknown): error is FieldkitRuntimeError {
    return error instanceof FieldkitRuntimeError && error.scope === ErrorScope.USAGE;
}

/**
 * Render an error as the single actionable line printed by the CLI.
 */
export function formatErrorLine(error: unknown): string {
    if (error instanceof FieldkitRuntimeError) {
        const recovery = Array.isArray(error.recovery)
            ? error.recovery.join(' ')
            : error.recovery;
        return recovery ? `${error.message} (${recovery})` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
