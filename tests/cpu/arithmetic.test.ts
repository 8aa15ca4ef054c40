import {describe, expect, it} from 'vitest';

import {cpuWithProgram, flagsOf} from '../helpers/cpu';

function signed(value: number): number {
    return value >= 0x80 ? value - 0x100 : value;
}

describe('CPU: ADC', () => {
    it('matches two\'s complement arithmetic for every operand pair and carry-in', () => {
        const cpu = cpuWithProgram([0x69, 0x00]); // ADC #imm

        for (let a = 0; a < 0x100; a++) {
            for (let b = 0; b < 0x100; b++) {
                for (const c of [0, 1]) {
                    cpu.state.pc = 0x8000;
                    cpu.bus.writeByte(0x8001, b);
                    cpu.state.a = a;
                    cpu.state.carryFlag = c === 1;

                    cpu.step();

                    const sum = a + b + c;
                    const signedSum = signed(a) + signed(b) + c;
                    const result = sum & 0xff;

                    if (cpu.state.a !== result
                        || cpu.state.carryFlag !== sum >= 0x100
                        || cpu.state.overflowFlag !== (signedSum < -128 || signedSum > 127)
                        || cpu.state.zeroFlag !== (result === 0)
                        || cpu.state.negativeFlag !== (result >= 0x80)) {
                        expect.unreachable(`ADC a=${a} b=${b} c=${c} gave a=${cpu.state.a} ${JSON.stringify(flagsOf(cpu.state))}`);
                    }
                }
            }
        }
    });

    it('adds the carry from the previous instruction', () => {
        // SEC / LDA #$10 / ADC #$20 / BRK
        const cpu = cpuWithProgram([0x38, 0xa9, 0x10, 0x69, 0x20, 0x00]);
        cpu.run();

        expect(cpu.state.a).toBe(0x31);
        expect(cpu.state.carryFlag).toBe(false);
    });

    it('sets zero and carry on $FF + $01', () => {
        const cpu = cpuWithProgram([0xa9, 0xff, 0x69, 0x01, 0x00]);
        cpu.run();

        expect(cpu.state.a).toBe(0x00);
        expect(cpu.state.zeroFlag).toBe(true);
        expect(cpu.state.carryFlag).toBe(true);
        expect(cpu.state.overflowFlag).toBe(false);
        expect(cpu.state.negativeFlag).toBe(false);
    });

    it('sets overflow and negative on $7F + $01', () => {
        const cpu = cpuWithProgram([0xa9, 0x7f, 0x69, 0x01, 0x00]);
        cpu.run();

        expect(cpu.state.a).toBe(0x80);
        expect(cpu.state.overflowFlag).toBe(true);
        expect(cpu.state.negativeFlag).toBe(true);
        expect(cpu.state.carryFlag).toBe(false);
    });

    it('ignores the decimal flag', () => {
        // SED / LDA #$09 / ADC #$01 / BRK
        const cpu = cpuWithProgram([0xf8, 0xa9, 0x09, 0x69, 0x01, 0x00]);
        cpu.run();

        expect(cpu.state.decimalModeFlag).toBe(true);
        expect(cpu.state.a).toBe(0x0a);
    });
});

describe('CPU: SBC', () => {
    it('behaves exactly like ADC with the inverted operand', () => {
        const sbc = cpuWithProgram([0xe9, 0x00]); // SBC #imm
        const adc = cpuWithProgram([0x69, 0x00]); // ADC #imm

        for (let a = 0; a < 0x100; a++) {
            for (let b = 0; b < 0x100; b++) {
                for (const c of [false, true]) {
                    for (const [cpu, operand] of [[sbc, b], [adc, ~b & 0xff]] as const) {
                        cpu.state.pc = 0x8000;
                        cpu.bus.writeByte(0x8001, operand);
                        cpu.state.a = a;
                        cpu.state.carryFlag = c;
                        cpu.step();
                    }

                    if (sbc.state.a !== adc.state.a
                        || sbc.state.getStatusFlag() !== adc.state.getStatusFlag()) {
                        expect.unreachable(`SBC a=${a} b=${b} c=${c}: ${JSON.stringify(flagsOf(sbc.state))} `
                            + `vs ${JSON.stringify(flagsOf(adc.state))}`);
                    }
                }
            }
        }
    });

    it('subtracts without borrow when carry is set', () => {
        // SEC / LDA #$50 / SBC #$B0 / BRK
        const cpu = cpuWithProgram([0x38, 0xa9, 0x50, 0xe9, 0xb0, 0x00]);
        cpu.run();

        expect(cpu.state.a).toBe(0xa0);
        expect(cpu.state.carryFlag).toBe(false);
        expect(cpu.state.overflowFlag).toBe(true);
        expect(cpu.state.negativeFlag).toBe(true);
    });

    it('borrows one more when carry is clear', () => {
        // LDA #$05 / SBC #$03 / BRK
        const cpu = cpuWithProgram([0xa9, 0x05, 0xe9, 0x03, 0x00]);
        cpu.run();

        expect(cpu.state.a).toBe(0x01);
        expect(cpu.state.carryFlag).toBe(true);
        expect(cpu.state.overflowFlag).toBe(false);
    });

    it('reads its operand from memory with absolute,Y addressing', () => {
        // SEC / LDY #$02 / LDA #$10 / SBC $0300,Y / BRK
        const cpu = cpuWithProgram([0x38, 0xa0, 0x02, 0xa9, 0x10, 0xf9, 0x00, 0x03, 0x00]);
        cpu.bus.writeByte(0x0302, 0x10);
        cpu.run();

        expect(cpu.state.a).toBe(0x00);
        expect(cpu.state.zeroFlag).toBe(true);
        expect(cpu.state.carryFlag).toBe(true);
    });
});
