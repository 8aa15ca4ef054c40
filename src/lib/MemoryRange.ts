import {sprintf} from 'sprintf-js';
import {MemoryRangeException} from './exceptions';

export class MemoryRange {

    private readonly _startAddress: number;
    private readonly _endAddress: number;

    public constructor(startAddress: number, endAddress: number) {
        if (startAddress < 0 || endAddress < 0) {
            throw new MemoryRangeException('Addresses cannot be less than 0.');
        }

        if (startAddress > endAddress) {
            throw new MemoryRangeException('End address must not be less than start address.');
        }

        this._startAddress = startAddress;
        this._endAddress = endAddress;
    }

    get startAddress(): number {
        return this._startAddress;
    }

    get endAddress(): number {
        return this._endAddress;
    }

    get size(): number {
        return this._endAddress - this._startAddress + 1;
    }

    public includes(address: number): boolean {
        return address <= this.endAddress && address >= this.startAddress;
    }

    public overlaps(other: MemoryRange): boolean {
        return this.includes(other.startAddress) || other.includes(this.startAddress);
    }

    public toString(): string {
        return '@' + sprintf('0x%04x', this.startAddress) + '-' + sprintf('0x%04x', this.endAddress);
    }
}
