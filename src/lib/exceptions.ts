import {CustomError} from 'ts-custom-error';
import {sprintf} from 'sprintf-js';

export class MemoryAccessException extends CustomError {
    constructor(message: string, public readonly address: number) {
        super(message);
    }
}

export class MemoryRangeException extends CustomError {
    constructor(message: string) {
        super(message);
    }
}

export class UnsupportedInstructionException extends CustomError {

    constructor(public readonly opcode: number, public readonly address: number) {
        super(sprintf('Unsupported instruction $%02X at $%04X', opcode, address));
    }
}

export class AddressingModeException extends CustomError {
    constructor(message: string) {
        super(message);
    }
}

export class HexDumpParseException extends CustomError {

    constructor(message: string, public readonly line: number) {
        super(`line ${line}: ${message}`);
    }
}

export class ConfigurationException extends CustomError {
    constructor(message: string) {
        super(message);
    }
}
