export {AddressingMode, operandWidth} from './lib/AddressingMode';
export type {IndirectAddressing} from './lib/AddressingMode';
export {Bus} from './lib/Bus';
export {Cpu, CpuStatus} from './lib/Cpu';
export type {CpuOptions} from './lib/Cpu';
export {CpuState, Register} from './lib/CpuState';
export * from './lib/constants';
export * from './lib/exceptions';
export {loadConfig} from './lib/config';
export type {RunnerConfig, TraceMode} from './lib/config';
export {Device} from './lib/devices/Device';
export {RamDevice} from './lib/devices/RamDevice';
export {RomDevice} from './lib/devices/RomDevice';
export {disassembleAt, disassembleOp, instructionSize} from './lib/disassembler';
export {formatHexDump, parseHexDump} from './lib/hexdump';
export type {HexDumpProgram} from './lib/hexdump';
export {MemoryRange} from './lib/MemoryRange';
export {decode, MNEMONICS, OPCODES} from './lib/opcodes';
export type {Mnemonic, OpcodeDefinition} from './lib/opcodes';
export {consoleTraceWriter, formatTraceLine} from './lib/trace';
export type {TraceFormat, TraceWriter} from './lib/trace';
