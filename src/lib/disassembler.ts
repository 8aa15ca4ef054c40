import {sprintf} from 'sprintf-js';

import {AddressingMode, operandWidth} from './AddressingMode';
import type {Bus} from './Bus';
import {decode} from './opcodes';
import {decodeAddress} from './utils';

export interface DisassembledInstruction {
    text: string;
    size: number;
}

function formatOperand(mode: AddressingMode, args: number[], accumulator: boolean): string {
    const zp = sprintf('$%02X', args[0] ?? 0);
    const abs = sprintf('$%04X', decodeAddress(args[0] ?? 0, args[1] ?? 0));

    switch (mode) {
        case AddressingMode.None:
            return accumulator ? 'A' : '';
        case AddressingMode.Immediate:
            return '#' + zp;
        case AddressingMode.ZeroPage:
            return zp;
        case AddressingMode.ZeroPageX:
            return zp + ',X';
        case AddressingMode.ZeroPageY:
            return zp + ',Y';
        case AddressingMode.Absolute:
            return abs;
        case AddressingMode.AbsoluteX:
            return abs + ',X';
        case AddressingMode.AbsoluteY:
            return abs + ',Y';
        case AddressingMode.IndirectX:
            return `(${zp},X)`;
        case AddressingMode.IndirectY:
            return `(${zp}),Y`;
    }
}

export function disassembleOp(opCode: number, args: number[]): string {
    const definition = decode(opCode);

    if (definition === undefined) {
        return sprintf('.byte $%02X', opCode & 0xff);
    }

    const operand = formatOperand(definition.mode, args, definition.mnemonic === 'ASL');
    return operand.length > 0 ? `${definition.mnemonic} ${operand}` : definition.mnemonic;
}

export function instructionSize(opCode: number): number {
    const definition = decode(opCode);
    return definition === undefined ? 1 : 1 + operandWidth(definition.mode);
}

export function disassembleAt(bus: Bus, address: number): DisassembledInstruction {
    const opCode = bus.readByte(address);
    const size = instructionSize(opCode);

    const args: number[] = [];
    for (let i = 1; i < size; i++) {
        args.push(bus.readByte((address + i) & 0xffff));
    }

    return {text: disassembleOp(opCode, args), size};
}
