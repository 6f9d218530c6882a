import { describe, it, expect } from 'vitest';
import { createRunOutcome, parseRunOutcome } from './outcome.js';

describe('createRunOutcome', () => {
    it('should freeze the outcome and its nested data', () => {
        const outcome = createRunOutcome('success', 'ok', { nested: { count: 1 } }, { report: '/tmp/r.json' });

        expect(Object.isFrozen(outcome)).toBe(true);
        expect(Object.isFrozen(outcome.data)).toBe(true);
        expect(Object.isFrozen(outcome.data.nested)).toBe(true);
        expect(Object.isFrozen(outcome.artifacts)).toBe(true);
    });

    it('should not be affected by later changes to the input objects', () => {
        const data: Record<string, unknown> = { count: 1 };
        const outcome = createRunOutcome('partial', 'some', data);

        data.count = 2;

        expect(outcome.data.count).toBe(1);
    });
});

describe('parseRunOutcome', () => {
    it('should fill defaults for omitted fields', () => {
        const parsed = parseRunOutcome({ status: 'success' });

        expect(parsed).toEqual({
            ok: true,
            outcome: { status: 'success', summary: '', data: {}, artifacts: {} },
        });
    });

    it('should reject unknown statuses', () => {
        const parsed = parseRunOutcome({ status: 'done', summary: 'x' });

        expect(parsed.ok).toBe(false);
    });

    it('should reject non-objects', () => {
        expect(parseRunOutcome(undefined).ok).toBe(false);
        expect(parseRunOutcome('success').ok).toBe(false);
    });
});
