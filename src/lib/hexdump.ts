import {sprintf} from 'sprintf-js';

import type {Bus} from './Bus';
import {HexDumpParseException} from './exceptions';

export interface HexDumpProgram {
    origin: number;
    bytes: Uint8Array;
}

const LINE_PATTERN = /^([0-9a-f]{1,4})\s*:\s*(.*)$/i;
const BYTE_PATTERN = /^[0-9a-f]{2}$/i;
const ZERO_RUN = '...';

/**
 * Parses `AAAA: bb bb bb` lines into one contiguous program. Every line must
 * start at the address where the previous one ended, unless a `...` line
 * between them stands for the zero bytes in the gap.
 */
export function parseHexDump(text: string): HexDumpProgram {
    const bytes: number[] = [];
    let origin: number | null = null;
    let zeroRun = false;

    const lines = text.split(/\r?\n/);

    for (let index = 0; index < lines.length; index++) {
        const line = lines[index].trim();
        const lineNumber = index + 1;

        if (line.length === 0) {
            continue;
        }

        if (line === ZERO_RUN) {
            if (origin === null) {
                throw new HexDumpParseException('"..." before the first address', lineNumber);
            }
            zeroRun = true;
            continue;
        }

        const match = LINE_PATTERN.exec(line);
        if (!match) {
            throw new HexDumpParseException(`expected "AAAA: bb bb ...", got "${line}"`, lineNumber);
        }

        const address = parseInt(match[1], 16);
        if (origin === null) {
            origin = address;
        } else if (zeroRun && address > origin + bytes.length) {
            while (origin + bytes.length < address) {
                bytes.push(0);
            }
        } else if (address !== origin + bytes.length) {
            throw new HexDumpParseException(
                sprintf('address $%04X does not follow $%04X', address, origin + bytes.length), lineNumber);
        }

        const tokens = match[2].split(/\s+/).filter((token: string) => token.length > 0);
        for (const token of tokens) {
            if (!BYTE_PATTERN.test(token)) {
                throw new HexDumpParseException(`invalid byte "${token}"`, lineNumber);
            }
            bytes.push(parseInt(token, 16));
        }
        zeroRun = false;
    }

    if (origin === null) {
        throw new HexDumpParseException('no data', 1);
    }

    return {origin, bytes: Uint8Array.from(bytes)};
}

function isZeroLine(bus: Bus, address: number, end: number): boolean {
    for (let i = address; i <= end; i++) {
        if (bus.readByte(i) !== 0) {
            return false;
        }
    }
    return true;
}

/**
 * Formats `start..end` (inclusive) in the syntax `parseHexDump` reads. A run
 * of all-zero lines following another all-zero line is collapsed into "...";
 * a trailing run is dropped when the dump is read back.
 */
export function formatHexDump(bus: Bus, start: number, end: number, width: number = 16): string {
    const lines: string[] = [];
    let previousIsZeroLine = false;
    let skipping = false;

    for (let address = start; address <= end; address += width) {
        const lineEnd = Math.min(address + width - 1, end);
        const zeroLine = isZeroLine(bus, address, lineEnd);

        if (zeroLine && previousIsZeroLine) {
            if (!skipping) {
                lines.push('...');
                skipping = true;
            }
            continue;
        }

        const values: string[] = [];
        for (let i = address; i <= lineEnd; i++) {
            values.push(sprintf('%02x', bus.readByte(i)));
        }
        lines.push(sprintf('%04x: %s', address, values.join(' ')));

        previousIsZeroLine = zeroLine;
        skipping = false;
    }

    return lines.join('\n');
}
