/**
 * Format a value as uppercase hex, zero-padded to `digits`
 */
export const toHex = (value: number, digits: number = 2): string => {
    return value.toString(16).toUpperCase().padStart(digits, '0');
};

/**
 * Reassemble a little-endian 16-bit value
 */
export const toWord = (lo: number, hi: number): number => {
    return (lo | (hi << 8)) & 0xFFFF;
};

/**
 * Sign-extend an 8-bit value
 */
export const signedByte = (value: number): number => {
    return value > 0x7F ? value - 0x100 : value;
};

/**
 * Interpret a 16-bit value as two's complement
 */
export const signedWord = (value: number): number => {
    return value > 0x7FFF ? value - 0x10000 : value;
};

/**
 * Parse a numeric value from various formats (hex, decimal, binary)
 * Returns null for anything that is not a whole non-negative number
 */
export const parseNumericValue = (value: string): number | null => {
    if (!value) return null;
    const trimmed = value.trim().toUpperCase();

    let digits = trimmed;
    let radix = 10;

    // Hex: 0xFF, $FF, FFh
    if (trimmed.startsWith('0X')) {
        digits = trimmed.substring(2);
        radix = 16;
    } else if (trimmed.startsWith('$')) {
        digits = trimmed.substring(1);
        radix = 16;
    } else if (trimmed.endsWith('H')) {
        digits = trimmed.substring(0, trimmed.length - 1);
        radix = 16;
    // Binary: 0b1010, %1010
    } else if (trimmed.startsWith('0B')) {
        digits = trimmed.substring(2);
        radix = 2;
    } else if (trimmed.startsWith('%')) {
        digits = trimmed.substring(1);
        radix = 2;
    }

    const pattern = radix === 16 ? /^[0-9A-F]+$/ : radix === 2 ? /^[01]+$/ : /^[0-9]+$/;
    if (!pattern.test(digits)) return null;

    return parseInt(digits, radix);
};
