export function byteToHex(val: number): string {
    return '0x' + ('0' + (val & 0xff).toString(16)).slice(-2);
}

export function wordToHex(val: number): string {
    return '0x' + ('000' + (val & 0xffff).toString(16)).slice(-4);
}

export function decodeAddress(lowByte: number, hiByte: number): number {
    return ((hiByte << 8) | lowByte) & 0xffff;
}

export function parseHexNumber(text: string): number | null {
    const digits = text.trim().replace(/^(0x|\$)/i, '');
    if (!/^[0-9a-f]+$/i.test(digits)) {
        return null;
    }
    return parseInt(digits, 16);
}
