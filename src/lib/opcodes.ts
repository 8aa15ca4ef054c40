import opcodeTable from './opcodes.json';

import {AddressingMode, isAddressingMode} from './AddressingMode';

export const MNEMONICS = [
    'ADC', 'AND', 'ASL', 'BRK', 'EOR', 'LDA', 'LDX', 'LDY', 'NOP', 'ORA', 'SBC', 'SEC',
    'SED', 'SEI', 'STA', 'STX', 'STY', 'TAX', 'TAY', 'TSX', 'TXA', 'TXS', 'TYA'
] as const;

export type Mnemonic = typeof MNEMONICS[number];

export interface OpcodeDefinition {
    readonly opcode: number;
    readonly mnemonic: Mnemonic;
    readonly mode: AddressingMode;
}

function isMnemonic(value: string): value is Mnemonic {
    return (MNEMONICS as readonly string[]).includes(value);
}

function buildOpcodeMap(table: Record<string, Record<string, string>>): Map<number, OpcodeDefinition> {
    const map = new Map<number, OpcodeDefinition>();

    for (const [mnemonic, modes] of Object.entries(table)) {
        if (!isMnemonic(mnemonic)) {
            throw new Error(`Unknown mnemonic ${mnemonic} in opcode table`);
        }

        for (const [hex, mode] of Object.entries(modes)) {
            const opcode = parseInt(hex, 16);
            if (!isAddressingMode(mode) || Number.isNaN(opcode) || opcode > 0xff) {
                throw new Error(`Invalid opcode table entry ${mnemonic} ${hex}: ${mode}`);
            }
            if (map.has(opcode)) {
                throw new Error(`Duplicate opcode ${hex} in opcode table`);
            }
            map.set(opcode, {opcode, mnemonic, mode});
        }
    }

    return map;
}

export const OPCODES: ReadonlyMap<number, OpcodeDefinition> = buildOpcodeMap(opcodeTable);

export function decode(opcode: number): OpcodeDefinition | undefined {
    return OPCODES.get(opcode & 0xff);
}
