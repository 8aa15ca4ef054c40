import {sprintf} from 'sprintf-js';

import {DEFAULT_END_ADDRESS, DEFAULT_START_ADDRESS} from './constants';
import {Device} from './devices/Device';
import {RamDevice} from './devices/RamDevice';
import {MemoryAccessException, MemoryRangeException} from './exceptions';

export class Bus {

    public readonly startAddress: number;
    public readonly endAddress: number;

    private readonly deviceMap: Map<number, Set<Device>>;

    private deviceAddressArray: Array<Device | undefined>;

    public constructor(startAddress: number = DEFAULT_START_ADDRESS, endAddress: number = DEFAULT_END_ADDRESS) {
        this.deviceMap = new Map<number, Set<Device>>();
        this.startAddress = startAddress;
        this.endAddress = endAddress;
        this.deviceAddressArray = Array(this.endAddress - this.startAddress + 1);
    }

    /**
     * A bus backed by a single RAM device spanning the whole address space.
     */
    public static withRam(): Bus {
        const bus = new Bus();
        bus.addDevice(new RamDevice(bus.startAddress, bus.endAddress, 'RAM'));
        return bus;
    }

    private buildDeviceAddressArray(): void {

        this.deviceAddressArray = Array(this.endAddress - this.startAddress + 1);

        // later (higher priority) devices shadow earlier ones
        this.sortedDevices().forEach((device: Device) => {
            const range = device.memoryRange;
            for (let address = range.startAddress; address <= range.endAddress; address++) {
                this.deviceAddressArray[address - this.startAddress] = device;
            }
        });
    }

    private sortedDevices(): Device[] {
        const devices: Device[] = [];

        Array.from(this.deviceMap.keys()).sort((a, b) => a - b).forEach((priority: number) => {
            this.deviceMap.get(priority)?.forEach((device: Device) => devices.push(device));
        });

        return devices;
    }

    public addDevice(device: Device, priority: number = 0): void {

        const range = device.memoryRange;

        if (range.startAddress < this.startAddress || range.startAddress > this.endAddress) {
            throw new MemoryRangeException(`start address of device ${device.name} does not fall within the address range of the bus`);
        }

        if (range.endAddress < this.startAddress || range.endAddress > this.endAddress) {
            throw new MemoryRangeException(`end address of device ${device.name} does not fall within the address range of the bus`);
        }

        let deviceSet = this.deviceMap.get(priority);

        if (deviceSet == null) {
            deviceSet = new Set<Device>();
            this.deviceMap.set(priority, deviceSet);
        }

        deviceSet.add(device);
        this.buildDeviceAddressArray();
    }

    public removeDevice(device: Device): void {
        this.deviceMap.forEach((deviceSet: Set<Device>) => deviceSet.delete(device));
        this.buildDeviceAddressArray();
    }

    public isComplete(): boolean {
        for (let address = this.startAddress; address <= this.endAddress; address++) {
            if (this.deviceAddressArray[address - this.startAddress] == null) {
                return false;
            }
        }

        return true;
    }

    private deviceAt(address: number, access: string): Device {
        const device = this.deviceAddressArray[address - this.startAddress];
        if (!device) {
            throw new MemoryAccessException(sprintf('Bus %s failed. No device at address $%04X', access, address), address);
        }
        return device;
    }

    public readByte(address: number): number {
        address &= 0xffff;

        const device = this.deviceAt(address, 'read');
        return device.readByte(address - device.memoryRange.startAddress) & 0xff;
    }

    public writeByte(address: number, value: number): void {
        address &= 0xffff;

        const device = this.deviceAt(address, 'write');
        device.write(address - device.memoryRange.startAddress, value & 0xff);
    }

    /**
     * Little-endian; the high byte is read from the next address, wrapping at $FFFF.
     */
    public readWord(address: number): number {
        const lo = this.readByte(address);
        const hi = this.readByte((address + 1) & 0xffff);
        return (hi << 8) | lo;
    }

    public writeWord(address: number, value: number): void {
        this.writeByte(address, value & 0xff);
        this.writeByte((address + 1) & 0xffff, (value >> 8) & 0xff);
    }

    public loadProgram(address: number, program: number[] | Uint8Array): void {
        if (address < this.startAddress || address + program.length - 1 > this.endAddress) {
            throw new MemoryRangeException(sprintf(
                'Program of %d bytes does not fit at $%04X (bus ends at $%04X)', program.length, address, this.endAddress));
        }

        for (let i = 0; i < program.length; i++) {
            this.writeByte(address + i, program[i]);
        }
    }
}
