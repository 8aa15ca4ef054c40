import {Device} from './Device';
import {MemoryAccessException} from '../exceptions';

export class RomDevice extends Device {

    protected readonly _buffer: Buffer;

    public constructor(startAddress: number, endAddress: number, name: string, buffer: Buffer, isMirror: boolean = false) {

        super(startAddress, endAddress, name);

        if (isMirror) {
            this._buffer = buffer;
        } else {
            this._buffer = Buffer.alloc(this.size, 0);
            buffer.copy(this._buffer, 0, 0, Math.min(buffer.length, this.size));
        }
    }

    public readByte(address: number): number {
        return this._buffer[address];
    }

    public write(address: number, data: number): void {
        throw new MemoryAccessException(`Cannot write into ROM ${this.name}`, this.memoryRange.startAddress + address);
    }
}
