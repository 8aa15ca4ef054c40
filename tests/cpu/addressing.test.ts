import {describe, expect, it} from 'vitest';

import {AddressingMode, operandWidth} from '../../src/lib/AddressingMode';
import {AddressingModeException} from '../../src/lib/exceptions';
import {cpuWithProgram} from '../helpers/cpu';

// Operand bytes live at $9000 for these tests; the opcode would be at $8FFF.
function cpuAt(operands: number[], options: Parameters<typeof cpuWithProgram>[1] = {}) {
    const cpu = cpuWithProgram([], options);
    cpu.state.pc = 0x9000;
    operands.forEach((byte: number, i: number) => cpu.bus.writeByte(0x9000 + i, byte));
    return cpu;
}

describe('Addressing modes', () => {
    it('immediate resolves to the program counter', () => {
        expect(cpuAt([0x42]).getOperandAddress(AddressingMode.Immediate)).toBe(0x9000);
    });

    it('zero page zero-extends the operand', () => {
        expect(cpuAt([0x42]).getOperandAddress(AddressingMode.ZeroPage)).toBe(0x0042);
    });

    it('zero page indexed wraps within page zero', () => {
        const cpu = cpuAt([0x80]);
        cpu.state.x = 0xff;
        cpu.state.y = 0x90;

        expect(cpu.getOperandAddress(AddressingMode.ZeroPageX)).toBe(0x007f);
        expect(cpu.getOperandAddress(AddressingMode.ZeroPageY)).toBe(0x0010);
    });

    it('absolute reads a little-endian word', () => {
        expect(cpuAt([0x34, 0x12]).getOperandAddress(AddressingMode.Absolute)).toBe(0x1234);
    });

    it('absolute indexed crosses pages and wraps at $FFFF', () => {
        const cpu = cpuAt([0xf0, 0x12]);
        cpu.state.x = 0x20;
        cpu.state.y = 0x01;
        expect(cpu.getOperandAddress(AddressingMode.AbsoluteX)).toBe(0x1310);
        expect(cpu.getOperandAddress(AddressingMode.AbsoluteY)).toBe(0x12f1);

        const wrapping = cpuAt([0xff, 0xff]);
        wrapping.state.x = 0x01;
        wrapping.state.y = 0x10;
        expect(wrapping.getOperandAddress(AddressingMode.AbsoluteX)).toBe(0x0000);
        expect(wrapping.getOperandAddress(AddressingMode.AbsoluteY)).toBe(0x000f);
    });

    it('implied mode has no operand address', () => {
        expect(() => cpuAt([]).getOperandAddress(AddressingMode.None)).toThrow(AddressingModeException);
    });

    it('operand widths are 0, 1 or 2 bytes', () => {
        expect(Object.values(AddressingMode).map((mode: AddressingMode) => [mode, operandWidth(mode)])).toEqual([
            [AddressingMode.None, 0],
            [AddressingMode.Immediate, 1],
            [AddressingMode.ZeroPage, 1],
            [AddressingMode.ZeroPageX, 1],
            [AddressingMode.ZeroPageY, 1],
            [AddressingMode.Absolute, 2],
            [AddressingMode.AbsoluteX, 2],
            [AddressingMode.AbsoluteY, 2],
            [AddressingMode.IndirectX, 1],
            [AddressingMode.IndirectY, 1]
        ]);
    });
});

describe('Indirect addressing (documented 6502 behaviour)', () => {
    it('(zp,X) adds X to the operand and reads the pointer there', () => {
        const cpu = cpuAt([0x20]);
        cpu.state.x = 0x04;
        cpu.bus.writeByte(0x0024, 0x74);
        cpu.bus.writeByte(0x0025, 0x20);

        expect(cpu.getOperandAddress(AddressingMode.IndirectX)).toBe(0x2074);
    });

    it('(zp,X) wraps the pointer location within page zero', () => {
        const cpu = cpuAt([0xff]);
        cpu.state.x = 0x01;
        cpu.bus.writeByte(0x0000, 0x34);
        cpu.bus.writeByte(0x0001, 0x12);

        expect(cpu.getOperandAddress(AddressingMode.IndirectX)).toBe(0x1234);
    });

    it('(zp,X) takes the high pointer byte from $00 when the pointer sits at $FF', () => {
        const cpu = cpuAt([0xff]);
        cpu.bus.writeByte(0x00ff, 0x10);
        cpu.bus.writeByte(0x0000, 0x30);
        cpu.bus.writeByte(0x0100, 0x04);

        expect(cpu.getOperandAddress(AddressingMode.IndirectX)).toBe(0x3010);
    });

    it('(zp),Y reads the pointer from page zero and then adds Y', () => {
        const cpu = cpuAt([0x86]);
        cpu.state.y = 0x10;
        cpu.bus.writeByte(0x0086, 0x28);
        cpu.bus.writeByte(0x0087, 0x40);

        expect(cpu.getOperandAddress(AddressingMode.IndirectY)).toBe(0x4038);
    });

    it('(zp),Y wraps the pointer fetch within page zero and the sum at $FFFF', () => {
        const cpu = cpuAt([0xff]);
        cpu.state.y = 0x20;
        cpu.bus.writeByte(0x00ff, 0xf0);
        cpu.bus.writeByte(0x0000, 0xff);

        expect(cpu.getOperandAddress(AddressingMode.IndirectY)).toBe(0x0010);
    });

    it('advances the program counter by one operand byte', () => {
        // LDA ($20,X) / LDA ($20),Y / BRK
        const cpu = cpuWithProgram([0xa1, 0x20, 0xb1, 0x20, 0x00]);
        cpu.run();

        expect(cpu.state.pc).toBe(0x8005);
    });
});

describe('Indirect addressing (legacy behaviour)', () => {
    const legacy = {indirectAddressing: 'legacy' as const};

    it('(zp,X) matches the documented result away from the page boundary', () => {
        const cpu = cpuAt([0x20], legacy);
        cpu.state.x = 0x04;
        cpu.bus.writeByte(0x0024, 0x74);
        cpu.bus.writeByte(0x0025, 0x20);

        expect(cpu.getOperandAddress(AddressingMode.IndirectX)).toBe(0x2074);
    });

    it('(zp,X) mixes $0100 into the high byte when the pointer sits at $FF', () => {
        const cpu = cpuAt([0xff], legacy);
        cpu.bus.writeByte(0x00ff, 0x10);
        cpu.bus.writeByte(0x0000, 0x30);
        cpu.bus.writeByte(0x0100, 0x04);
        cpu.bus.writeByte(0x0001, 0x99);

        expect(cpu.getOperandAddress(AddressingMode.IndirectX)).toBe(0x3410);
    });

    it('(zp),Y uses the two bytes at the program counter as the base address', () => {
        const cpu = cpuAt([0x34, 0x12], legacy);
        cpu.state.y = 0x10;

        expect(cpu.getOperandAddress(AddressingMode.IndirectY)).toBe(0x1244);
    });

    it('still advances the program counter by one operand byte', () => {
        const cpu = cpuWithProgram([0xb1, 0x00, 0x00], legacy);
        cpu.run();

        expect(cpu.state.pc).toBe(0x8003);
    });
});
