import chalk from 'chalk';
import * as fs from 'fs-extra';

import {RunnerConfig, parseOrigin} from './config';
import {Cpu} from './Cpu';
import {CpuState} from './CpuState';
import {Bus} from './Bus';
import {ConfigurationException} from './exceptions';
import {formatHexDump, parseHexDump} from './hexdump';
import {consoleTraceWriter} from './trace';

export interface RunnerArguments {
    file: string;
    hex: boolean;
    origin?: number;
    trace: boolean;
    dump?: {start: number; end: number};
}

export function parseArguments(argv: string[]): RunnerArguments {
    let file: string | undefined;
    const args: Omit<RunnerArguments, 'file'> = {hex: false, trace: false};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--hex':
                args.hex = true;
                break;
            case '--trace':
                args.trace = true;
                break;
            case '--origin':
                args.origin = parseOrigin(requireValue(argv, ++i, arg));
                break;
            case '--dump': {
                const [start, end] = requireValue(argv, ++i, arg).split(':');
                if (end === undefined) {
                    throw new ConfigurationException(`Invalid --dump range "${start}": expected <start>:<end>`);
                }
                args.dump = {start: parseOrigin(start), end: parseOrigin(end)};
                break;
            }
            default:
                if (arg.startsWith('--') || file !== undefined) {
                    throw new ConfigurationException(`Unexpected argument "${arg}"`);
                }
                file = arg;
        }
    }

    if (file === undefined) {
        throw new ConfigurationException('Usage: byte6502 <file> [--hex] [--origin <hex>] [--trace] [--dump <start>:<end>]');
    }

    return {file, ...args};
}

function requireValue(argv: string[], index: number, flag: string): string {
    const value = argv[index];
    if (value === undefined) {
        throw new ConfigurationException(`Missing value for ${flag}`);
    }
    return value;
}

/**
 * Loads a program file, runs it to halt and reports the final state.
 */
export async function runFile(args: RunnerArguments, config: RunnerConfig,
                              log: (line: string) => void = console.log): Promise<Cpu> {

    let program: Uint8Array;
    let origin = args.origin ?? config.origin;

    if (args.hex) {
        const parsed = parseHexDump(await fs.readFile(args.file, 'utf8'));
        program = parsed.bytes;
        origin = args.origin ?? parsed.origin;
    } else {
        program = await fs.readFile(args.file);
    }

    const traceMode = args.trace && config.trace === 'off' ? 'on' : config.trace;

    const cpu = new Cpu(new CpuState(), Bus.withRam(), {
        origin,
        indirectAddressing: config.indirectAddressing,
        trace: traceMode === 'off' ? undefined : consoleTraceWriter(traceMode === 'debug' ? 'debug' : 'plain', log)
    });

    cpu.loadAndRun(program);

    log(chalk.bold(`Halted after ${cpu.state.stepCounter} instructions`));
    log(cpu.state.toTraceEvent());

    if (args.dump) {
        log(formatHexDump(cpu.bus, args.dump.start, args.dump.end));
    }

    return cpu;
}
