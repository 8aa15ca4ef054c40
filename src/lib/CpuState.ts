import {sprintf} from 'sprintf-js';
import {byteToHex, wordToHex} from './utils';
import {disassembleOp} from './disassembler';
import {
    DEFAULT_SP,
    P_BREAK,
    P_CARRY,
    P_DECIMAL,
    P_IRQ_DISABLE,
    P_NEGATIVE,
    P_OVERFLOW,
    P_UNUSED,
    P_ZERO
} from './constants';

export enum Register {
    A = 'A',
    X = 'X',
    Y = 'Y',
    SP = 'SP'
}

export class CpuState {

    public a: number = 0;

    public x: number = 0;

    public y: number = 0;

    public sp: number = DEFAULT_SP;

    public pc: number = 0;

    /** Opcode of the instruction executed last, fetched from `lastPc`. */
    public ir: number = 0;
    public args: number[] = [];
    public lastPc: number = 0;

    public carryFlag: boolean = false;
    public zeroFlag: boolean = false;
    public irqDisableFlag: boolean = true;
    public decimalModeFlag: boolean = false;
    public breakFlag: boolean = true;
    public overflowFlag: boolean = false;
    public negativeFlag: boolean = false;

    public stepCounter: number = 0;

    public constructor(state?: CpuState) {
        if (state) {
            this.a = state.a;
            this.x = state.x;
            this.y = state.y;
            this.sp = state.sp;
            this.pc = state.pc;
            this.ir = state.ir;
            this.args = state.args.slice();
            this.lastPc = state.lastPc;
            this.carryFlag = state.carryFlag;
            this.zeroFlag = state.zeroFlag;
            this.irqDisableFlag = state.irqDisableFlag;
            this.decimalModeFlag = state.decimalModeFlag;
            this.breakFlag = state.breakFlag;
            this.overflowFlag = state.overflowFlag;
            this.negativeFlag = state.negativeFlag;
            this.stepCounter = state.stepCounter;
        }
    }

    public getRegister(register: Register): number {
        switch (register) {
            case Register.A:
                return this.a;
            case Register.X:
                return this.x;
            case Register.Y:
                return this.y;
            case Register.SP:
                return this.sp;
        }
    }

    public setRegister(register: Register, value: number): void {
        value &= 0xff;
        switch (register) {
            case Register.A:
                this.a = value;
                break;
            case Register.X:
                this.x = value;
                break;
            case Register.Y:
                this.y = value;
                break;
            case Register.SP:
                this.sp = value;
                break;
        }
    }

    public getStatusFlag(): number {
        let status = P_UNUSED;
        if (this.carryFlag) {
            status |= P_CARRY;
        }
        if (this.zeroFlag) {
            status |= P_ZERO;
        }
        if (this.irqDisableFlag) {
            status |= P_IRQ_DISABLE;
        }
        if (this.decimalModeFlag) {
            status |= P_DECIMAL;
        }
        if (this.breakFlag) {
            status |= P_BREAK;
        }
        if (this.overflowFlag) {
            status |= P_OVERFLOW;
        }
        if (this.negativeFlag) {
            status |= P_NEGATIVE;
        }
        return status;
    }

    public setStatusFlag(value: number): void {
        this.carryFlag = (value & P_CARRY) !== 0;
        this.zeroFlag = (value & P_ZERO) !== 0;
        this.irqDisableFlag = (value & P_IRQ_DISABLE) !== 0;
        this.decimalModeFlag = (value & P_DECIMAL) !== 0;
        this.breakFlag = (value & P_BREAK) !== 0;
        this.overflowFlag = (value & P_OVERFLOW) !== 0;
        this.negativeFlag = (value & P_NEGATIVE) !== 0;
    }

    public toTraceEvent(currentPC: number = this.pc): string {
        return '| ' +
            'pc = ' + wordToHex(currentPC) + ' | ' +
            'a = ' + byteToHex(this.a) + ' | ' +
            'x = ' + byteToHex(this.x) + ' | ' +
            'y = ' + byteToHex(this.y) + ' | ' +
            'sp = ' + wordToHex(this.sp) + ' | ' +
            'p[NV-BDIZC] = ' + this.getProcessorStatusString() +
            ' |';
    }

    public toTraceEventDebug(currentPC: number = this.lastPc): string {
        return this.getInstructionByteStatus() + '\t\t' +
            sprintf('%-14s', disassembleOp(this.ir, this.args)) +
            '\t\t' +
            '| pc = ' + wordToHex(currentPC) + ' | ' +
            'a = ' + byteToHex(this.a) + ' | ' +
            'x = ' + byteToHex(this.x) + ' | ' +
            'y = ' + byteToHex(this.y) + ' | ' +
            'sp = ' + wordToHex(this.sp) + ' | ' +
            'Flags = ' + this.getProcessorStatusStringDebug() + ' | ';
    }

    public getInstructionByteStatus(): string {
        const bytes = [this.ir, ...this.args].map((byte: number) => byteToHex(byte)).join(' ');
        return sprintf('%s  %-14s', wordToHex(this.lastPc), bytes);
    }

    public getProcessorStatusString(): string {
        return (this.negativeFlag ? '1' : '0') +
            (this.overflowFlag ? '1' : '0') +
            '1' +
            (this.breakFlag ? '1' : '0') +
            (this.decimalModeFlag ? '1' : '0') +
            (this.irqDisableFlag ? '1' : '0') +
            (this.zeroFlag ? '1' : '0') +
            (this.carryFlag ? '1' : '0');
    }

    public getProcessorStatusStringDebug(): string {
        return '[' + (this.negativeFlag ? 'N' : '.') +
            (this.overflowFlag ? 'V' : '.') +
            '-' +
            (this.breakFlag ? 'B' : '.') +
            (this.decimalModeFlag ? 'D' : '.') +
            (this.irqDisableFlag ? 'I' : '.') +
            (this.zeroFlag ? 'Z' : '.') +
            (this.carryFlag ? 'C' : '.') +
            ']';
    }
}
