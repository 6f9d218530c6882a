import chalk from 'chalk';
import type { ProgressSink, RunOutcome } from '@fieldkit/core';

export interface TextSink {
    write(chunk: string): unknown;
}

export function formatProgressLine(fraction: number, message: string): string {
    const percent = String(Math.round(fraction * 100)).padStart(3);
    return `  [${percent}%] ${message}`;
}

/**
 * Progress goes to stderr so that stdout carries only the result.
 */
export function createProgressRenderer(stream: TextSink = process.stderr): ProgressSink {
    return (fraction, message) => {
        stream.write(`${chalk.dim(formatProgressLine(fraction, message))}\n`);
    };
}

/**
 * Lines shown for an outcome: `data.output` when it is a string, otherwise the
 * summary, followed by one `name: path` line per artifact.
 */
export function formatOutcome(outcome: RunOutcome): string[] {
    const output = outcome.data['output'];
    const lines = [typeof output === 'string' ? output : outcome.summary];
    for (const [name, artifactPath] of Object.entries(outcome.artifacts)) {
        lines.push(`${name}: ${artifactPath}`);
    }
    return lines;
}

export function printOutcome(outcome: RunOutcome): void {
    const lines = formatOutcome(outcome);
    switch (outcome.status) {
        case 'success':
            console.log(lines.join('\n'));
            break;
        case 'partial':
            console.log(lines.join('\n'));
            console.error(chalk.yellow(`Completed with errors: ${outcome.summary}`));
            break;
        case 'cancelled':
            console.error(chalk.yellow(lines.join('\n')));
            break;
        case 'failure':
            console.error(chalk.red(lines.join('\n')));
            break;
    }
}
