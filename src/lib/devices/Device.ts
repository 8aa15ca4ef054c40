import {MemoryRange} from '../MemoryRange';

export abstract class Device {

    protected readonly _memoryRange: MemoryRange;

    protected readonly _name: string;

    public constructor(startAddress: number, endAddress: number, name: string) {
        this._memoryRange = new MemoryRange(startAddress, endAddress);
        this._name = name;
    }

    get size(): number {
        return this._memoryRange.size;
    }

    get memoryRange(): MemoryRange {
        return this._memoryRange;
    }

    get name(): string {
        return this._name;
    }

    /**
     * Addresses passed to a device are relative to the start of its range.
     */
    public abstract readByte(address: number): number;

    public abstract write(address: number, data: number): void;

    public toString(): string {
        return `${this.name}${this.memoryRange.toString()}`;
    }
}
