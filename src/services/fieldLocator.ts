import type { FieldLocator } from '../types';

export const fieldLocator = (byteIndex: number, mask: number, shift: number): FieldLocator =>
    Object.freeze({ byteIndex, mask, shift });

/**
 * Locator for a whole byte of the instruction (displacement, address, data)
 */
export const wholeByte = (byteIndex: number): FieldLocator => fieldLocator(byteIndex, 0xFF, 0);

/**
 * Read a field from an instruction window, or from a single byte already
 * selected by the caller (the byte index is then ignored)
 */
export const readField = (locator: FieldLocator, window: Uint8Array | number): number => {
    const value = typeof window === 'number' ? window : window[locator.byteIndex];
    return (value & locator.mask) >> locator.shift;
};

// First byte
export const D_FIELD = fieldLocator(0, 0b00000010, 1);
export const S_FIELD = fieldLocator(0, 0b00000010, 1);
export const W_FIELD = fieldLocator(0, 0b00000001, 0);
export const W_FIELD_IMMEDIATE_REG = fieldLocator(0, 0b00001000, 3);
export const REG_FIELD_OPCODE = fieldLocator(0, 0b00000111, 0);

// Second (mod-reg-rm) byte
export const MOD_FIELD = fieldLocator(1, 0b11000000, 6);
export const REG_FIELD = fieldLocator(1, 0b00111000, 3);
export const SR_FIELD = fieldLocator(1, 0b00011000, 3);
export const RM_FIELD = fieldLocator(1, 0b00000111, 0);

// Trailing bytes
export const DISP_LO = wholeByte(2);
export const DISP_HI = wholeByte(3);
export const ADDR_LO = wholeByte(1);
export const ADDR_HI = wholeByte(2);
