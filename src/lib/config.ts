import type {IndirectAddressing} from './AddressingMode';
import {DEFAULT_PROGRAM_ORIGIN} from './constants';
import {ConfigurationException} from './exceptions';
import {parseHexNumber} from './utils';

export type TraceMode = 'off' | 'on' | 'debug';

export interface RunnerConfig {
    origin: number;
    indirectAddressing: IndirectAddressing;
    trace: TraceMode;
}

export const ENV = {
    ORIGIN: 'BYTE6502_ORIGIN',
    INDIRECT: 'BYTE6502_INDIRECT',
    TRACE: 'BYTE6502_TRACE'
};

export function parseOrigin(text: string): number {
    const origin = parseHexNumber(text);
    if (origin === null || origin > 0xffff) {
        throw new ConfigurationException(`Invalid origin "${text}": expected a hex address between 0000 and FFFF`);
    }
    return origin;
}

function parseIndirect(text: string): IndirectAddressing {
    if (text === 'standard' || text === 'legacy') {
        return text;
    }
    throw new ConfigurationException(`Invalid ${ENV.INDIRECT} "${text}": expected standard or legacy`);
}

function parseTrace(text: string): TraceMode {
    if (text === 'off' || text === 'on' || text === 'debug') {
        return text;
    }
    throw new ConfigurationException(`Invalid ${ENV.TRACE} "${text}": expected off, on or debug`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
    const origin = env[ENV.ORIGIN];
    const indirect = env[ENV.INDIRECT];
    const trace = env[ENV.TRACE];

    return {
        origin: origin ? parseOrigin(origin) : DEFAULT_PROGRAM_ORIGIN,
        indirectAddressing: indirect ? parseIndirect(indirect) : 'standard',
        trace: trace ? parseTrace(trace) : env.NODE_ENV === 'DEBUG' ? 'debug' : 'off'
    };
}
