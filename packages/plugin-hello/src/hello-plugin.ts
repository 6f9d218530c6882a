import { setTimeout as sleep } from 'timers/promises';
import {
    cancelledOutcome,
    createRunOutcome,
    type CapabilityDescriptor,
    type ExecutionContext,
    type RunOutcome,
    type ToolArgs,
    type ToolPlugin,
} from '@fieldkit/core';

const DEFAULT_DELAY_MS = 100;

/**
 * Greets someone a few times. Exercises required, defaulted and boolean
 * capabilities, progress reporting and cancellation.
 *
 * Reads `greeting` and `delayMs` from its `tools.hello` config section.
 */
export class HelloPlugin implements ToolPlugin {
    readonly name = 'hello';
    readonly description = 'Hello world test plugin';
    readonly version = '0.1.0';
    readonly requiresAuth = false;

    getCapabilities(): CapabilityDescriptor[] {
        return [
            { name: 'name', description: 'Name to greet', kind: 'string', required: true },
            { name: 'count', description: 'Number of greetings', kind: 'int', required: false, default: 1 },
            { name: 'verbose', description: 'Verbose output', kind: 'bool', required: false },
        ];
    }

    async run(args: ToolArgs, ctx: ExecutionContext): Promise<RunOutcome> {
        const name = String(args.name);
        const count = typeof args.count === 'number' ? args.count : 1;
        const verbose = args.verbose === true;
        const greetingWord = typeof ctx.config.greeting === 'string' ? ctx.config.greeting : 'Hello';
        const delayMs = typeof ctx.config.delayMs === 'number' ? ctx.config.delayMs : DEFAULT_DELAY_MS;

        ctx.progress(0, 'Starting greetings');

        const greetings: string[] = [];
        for (let i = 0; i < count; i++) {
            if (ctx.cancelled) {
                return cancelledOutcome('Cancelled by user', { greetings });
            }

            const greeting = `${greetingWord}, ${name}!`;
            greetings.push(greeting);
            ctx.progress(
                (i + 1) / count,
                verbose ? `Greeting ${i + 1}/${count}: ${greeting}` : `Progress: ${i + 1}/${count}`
            );

            if (delayMs > 0) {
                await sleep(delayMs);
            }
        }

        ctx.progress(1, 'Done');
        return createRunOutcome('success', `Generated ${count} greeting(s) for ${name}`, {
            name,
            count,
            greetings,
            output: greetings.join('\n'),
        });
    }
}

export function createPlugin(): HelloPlugin {
    return new HelloPlugin();
}
