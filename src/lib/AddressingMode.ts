export enum AddressingMode {
    None = 'None',
    Immediate = 'Immediate',
    ZeroPage = 'ZeroPage',
    ZeroPageX = 'ZeroPageX',
    ZeroPageY = 'ZeroPageY',
    Absolute = 'Absolute',
    AbsoluteX = 'AbsoluteX',
    AbsoluteY = 'AbsoluteY',
    IndirectX = 'IndirectX',
    IndirectY = 'IndirectY'
}

/**
 * How the (zp,X) and (zp),Y modes fetch their pointer.
 *
 * `standard` is the documented 6502 behaviour. `legacy` reproduces the
 * emulator this core was ported from: (zp,X) does not wrap the high
 * pointer byte's 16-bit read, and (zp),Y uses the operand bytes directly
 * as a little-endian base address with no indirection.
 */
export type IndirectAddressing = 'standard' | 'legacy';

const OPERAND_WIDTHS: Record<AddressingMode, number> = {
    [AddressingMode.None]: 0,
    [AddressingMode.Immediate]: 1,
    [AddressingMode.ZeroPage]: 1,
    [AddressingMode.ZeroPageX]: 1,
    [AddressingMode.ZeroPageY]: 1,
    [AddressingMode.Absolute]: 2,
    [AddressingMode.AbsoluteX]: 2,
    [AddressingMode.AbsoluteY]: 2,
    [AddressingMode.IndirectX]: 1,
    [AddressingMode.IndirectY]: 1
};

export function operandWidth(mode: AddressingMode): number {
    return OPERAND_WIDTHS[mode];
}

export function isAddressingMode(value: string): value is AddressingMode {
    return Object.prototype.hasOwnProperty.call(OPERAND_WIDTHS, value);
}
