import chalk from 'chalk';

import type {CpuState} from './CpuState';

export type TraceFormat = 'plain' | 'debug';

/**
 * Receives the CPU state after each executed instruction, and once more when
 * the CPU halts. `state.lastPc` is the address the instruction was fetched from.
 */
export type TraceWriter = (state: CpuState, halted: boolean) => void;

export function formatTraceLine(state: CpuState, format: TraceFormat): string {
    return format === 'debug'
        ? state.toTraceEventDebug(state.lastPc)
        : state.toTraceEvent(state.lastPc);
}

export function consoleTraceWriter(format: TraceFormat = 'plain',
                                   log: (line: string) => void = console.log): TraceWriter {
    return (state: CpuState, halted: boolean) => {
        const text = formatTraceLine(state, format);

        if (halted) {
            log(chalk.yellow(text));
        } else {
            log(format === 'debug' ? chalk.green(text) : text);
        }
    };
}
