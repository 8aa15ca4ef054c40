import {AddressingMode, IndirectAddressing, operandWidth} from './AddressingMode';
import {Bus} from './Bus';
import {CpuState, Register} from './CpuState';
import {ADDRESS, DEFAULT_PROGRAM_ORIGIN, DEFAULT_SP, OPCODE_BRK} from './constants';
import {AddressingModeException, UnsupportedInstructionException} from './exceptions';
import {decode, Mnemonic, OpcodeDefinition} from './opcodes';
import type {TraceWriter} from './trace';
import {decodeAddress} from './utils';

export enum CpuStatus {
    Running = 'running',
    Halted = 'halted'
}

export interface CpuOptions {
    /** Where `loadProgram` places code and points the reset vector. */
    origin?: number;
    indirectAddressing?: IndirectAddressing;
    trace?: TraceWriter;
}

type TransferMnemonic = Extract<Mnemonic, 'TAX' | 'TAY' | 'TSX' | 'TXA' | 'TXS' | 'TYA'>;

/** A [source, destination] pair whose registers always differ. */
type Transfer = {[F in Register]: readonly [F, Exclude<Register, F>]}[Register];

const TRANSFERS: Record<TransferMnemonic, Transfer> = {
    TAX: [Register.A, Register.X],
    TAY: [Register.A, Register.Y],
    TSX: [Register.SP, Register.X],
    TXA: [Register.X, Register.A],
    TXS: [Register.X, Register.SP],
    TYA: [Register.Y, Register.A]
};

export class Cpu {

    private _state: CpuState;

    private readonly _bus: Bus;

    private _status: CpuStatus = CpuStatus.Halted;

    private readonly origin: number;

    private readonly indirectAddressing: IndirectAddressing;

    private readonly trace?: TraceWriter;

    constructor(state = new CpuState(), bus = Bus.withRam(), options: CpuOptions = {}) {
        this._state = state;
        this._bus = bus;
        this.origin = options.origin ?? DEFAULT_PROGRAM_ORIGIN;
        this.indirectAddressing = options.indirectAddressing ?? 'standard';
        this.trace = options.trace;
    }

    get state(): CpuState {
        return this._state;
    }

    set state(value: CpuState) {
        this._state = value;
    }

    get bus(): Bus {
        return this._bus;
    }

    get status(): CpuStatus {
        return this._status;
    }

    public loadProgram(program: number[] | Uint8Array, origin: number = this.origin): void {
        this.bus.loadProgram(origin, program);
        this.bus.writeWord(ADDRESS.RST, origin);
    }

    /**
     * The Break flag is left as it is; it stays set after a halted run.
     */
    public reset(): void {
        this.state.sp = DEFAULT_SP;
        this.state.irqDisableFlag = true;
        this.state.pc = this.bus.readWord(ADDRESS.RST);

        this._status = CpuStatus.Running;
    }

    public loadAndRun(program: number[] | Uint8Array, origin: number = this.origin): void {
        this.loadProgram(program, origin);
        this.reset();
        this.run();
    }

    public run(): void {
        while (this._status === CpuStatus.Running) {
            this.step();
        }
    }

    /**
     * Runs at most `num` instructions, fewer if the CPU halts first.
     * Returns how many were fetched.
     */
    public steps(num: number): number {
        let executed = 0;
        while (executed < num && this._status === CpuStatus.Running) {
            this.step();
            executed++;
        }
        return executed;
    }

    public step(): CpuStatus {
        if (this._status === CpuStatus.Halted) {
            return this._status;
        }

        const currentPC = this.state.pc;
        const opcode = this.bus.readByte(currentPC);
        this.incrementPC();

        this.state.lastPc = currentPC;
        this.state.ir = opcode;
        this.state.stepCounter++;

        if (opcode === OPCODE_BRK) {
            this.state.args = [];
            this.halt();
            return this._status;
        }

        const definition = decode(opcode);
        if (definition === undefined) {
            this.state.args = [];
            this._status = CpuStatus.Halted;
            if (this.trace) {
                this.trace(this.state, true);
            }
            throw new UnsupportedInstructionException(opcode, currentPC);
        }

        this.state.args = this.peekOperands(operandWidth(definition.mode));
        this.execute(definition);

        if (this.trace) {
            this.trace(this.state, false);
        }

        return this._status;
    }

    public getOperandAddress(mode: AddressingMode): number {
        const pc = this.state.pc;

        switch (mode) {
            case AddressingMode.Immediate:
                return pc;
            case AddressingMode.ZeroPage:
                return this.bus.readByte(pc);
            case AddressingMode.ZeroPageX:
                return (this.bus.readByte(pc) + this.state.x) & 0xff;
            case AddressingMode.ZeroPageY:
                return (this.bus.readByte(pc) + this.state.y) & 0xff;
            case AddressingMode.Absolute:
                return this.bus.readWord(pc);
            case AddressingMode.AbsoluteX:
                return (this.bus.readWord(pc) + this.state.x) & 0xffff;
            case AddressingMode.AbsoluteY:
                return (this.bus.readWord(pc) + this.state.y) & 0xffff;
            case AddressingMode.IndirectX:
                return this.indirectXAddress(this.bus.readByte(pc));
            case AddressingMode.IndirectY:
                return this.indirectYAddress(pc);
            case AddressingMode.None:
                throw new AddressingModeException('Implied addressing has no operand address');
        }
    }

    private indirectXAddress(zp: number): number {
        const pointer = (zp + this.state.x) & 0xff;

        if (this.indirectAddressing === 'legacy') {
            const lo = this.bus.readWord(pointer);
            const hi = this.bus.readWord((pointer + 1) & 0xff);
            return ((hi << 8) | lo) & 0xffff;
        }

        return decodeAddress(this.bus.readByte(pointer), this.bus.readByte((pointer + 1) & 0xff));
    }

    private indirectYAddress(pc: number): number {
        if (this.indirectAddressing === 'legacy') {
            const hi = this.bus.readByte((pc + 1) & 0xffff);
            const lo = this.bus.readByte(pc);
            return (decodeAddress(lo, hi) + this.state.y) & 0xffff;
        }

        const zp = this.bus.readByte(pc);
        const base = decodeAddress(this.bus.readByte(zp), this.bus.readByte((zp + 1) & 0xff));
        return (base + this.state.y) & 0xffff;
    }

    private execute(definition: OpcodeDefinition): void {
        const mode = definition.mode;

        switch (definition.mnemonic) {
            case 'NOP':
                break;

            case 'SEC':
                this.state.carryFlag = true;
                break;
            case 'SED':
                this.state.decimalModeFlag = true;
                break;
            case 'SEI':
                this.state.irqDisableFlag = true;
                break;

            case 'ADC':
                this.addWithCarry(this.readOperand(mode));
                break;
            case 'SBC':
                this.addWithCarry(~this.readOperand(mode) & 0xff);
                break;

            case 'AND':
                this.bitwise(this.state.a & this.readOperand(mode));
                break;
            case 'ORA':
                this.bitwise(this.state.a | this.readOperand(mode));
                break;
            case 'EOR':
                this.bitwise(this.state.a ^ this.readOperand(mode));
                break;

            case 'ASL':
                this.asl(mode);
                break;

            case 'LDA':
                this.load(Register.A, mode);
                break;
            case 'LDX':
                this.load(Register.X, mode);
                break;
            case 'LDY':
                this.load(Register.Y, mode);
                break;

            case 'STA':
                this.store(Register.A, mode);
                break;
            case 'STX':
                this.store(Register.X, mode);
                break;
            case 'STY':
                this.store(Register.Y, mode);
                break;

            case 'TAX':
            case 'TAY':
            case 'TSX':
            case 'TXA':
            case 'TXS':
            case 'TYA':
                this.transfer(TRANSFERS[definition.mnemonic]);
                break;
        }

        this.state.pc = (this.state.pc + operandWidth(mode)) & 0xffff;
    }

    private halt(): void {
        this.state.breakFlag = true;
        this._status = CpuStatus.Halted;

        if (this.trace) {
            this.trace(this.state, true);
        }
    }

    private readOperand(mode: AddressingMode): number {
        return this.bus.readByte(this.getOperandAddress(mode));
    }

    private peekOperands(width: number): number[] {
        const args: number[] = [];
        for (let i = 0; i < width; i++) {
            args.push(this.bus.readByte((this.state.pc + i) & 0xffff));
        }
        return args;
    }

    private addWithCarry(operand: number): void {
        const acc = this.state.a;
        const sum = acc + operand + this.getCarryBit();
        const result = sum & 0xff;

        this.state.a = result;

        this.setArithmeticFlags(result);
        this.setCarryFlag(sum > 0xff);
        this.setOverflowFlag(((acc ^ result) & (operand ^ result) & 0x80) !== 0);
    }

    private bitwise(result: number): void {
        this.state.a = result & 0xff;
        this.setArithmeticFlags(this.state.a);
    }

    private asl(mode: AddressingMode): void {
        if (mode === AddressingMode.None) {
            this.state.a = this.shiftLeft(this.state.a);
            this.setArithmeticFlags(this.state.a);
            return;
        }

        const address = this.getOperandAddress(mode);
        const result = this.shiftLeft(this.bus.readByte(address));
        this.bus.writeByte(address, result);
        this.setArithmeticFlags(result);
    }

    private shiftLeft(m: number): number {
        this.setCarryFlag((m & 0x80) !== 0);
        return (m << 1) & 0xff;
    }

    private load(register: Register, mode: AddressingMode): void {
        this.state.setRegister(register, this.readOperand(mode));
        this.setArithmeticFlags(this.state.getRegister(register));
    }

    private store(register: Register, mode: AddressingMode): void {
        this.bus.writeByte(this.getOperandAddress(mode), this.state.getRegister(register));
    }

    private transfer([from, into]: Transfer): void {
        this.state.setRegister(into, this.state.getRegister(from));

        if (into !== Register.SP) {
            this.setArithmeticFlags(this.state.getRegister(into));
        }
    }

    private incrementPC(): void {
        this.state.pc = (this.state.pc + 1) & 0xffff;
    }

    private getCarryBit(): number {
        return (this.state.carryFlag ? 1 : 0);
    }

    public setCarryFlag(carryFlag: boolean): void {
        this.state.carryFlag = carryFlag;
    }

    public setZeroFlag(zeroFlag: boolean): void {
        this.state.zeroFlag = zeroFlag;
    }

    public setNegativeFlag(negativeFlag: boolean): void {
        this.state.negativeFlag = negativeFlag;
    }

    public setOverflowFlag(overflowFlag: boolean): void {
        this.state.overflowFlag = overflowFlag;
    }

    private setArithmeticFlags(result: number): void {
        this.setZeroFlag(result === 0);
        this.setNegativeFlag((result & 0x80) !== 0);
    }
}
