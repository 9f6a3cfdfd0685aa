import type { InvalidOffsetError, TruncatedInstructionError, UnknownInstructionError } from '../types';
import { toHex } from './numberFormat';

export type DefectKind = 'unknownDisplacementSize' | 'missingImmediateData';

/**
 * Raised for states the catalog should make unreachable.
 * Unlike a DecodeError this is never part of a normal decode result.
 */
export class DecoderDefectError extends Error {
    readonly kind: DefectKind;

    constructor(kind: DefectKind, message: string) {
        super(message);
        this.name = 'DecoderDefectError';
        this.kind = kind;
    }
}

export const unknownInstruction = (offset: number, byte: number): UnknownInstructionError => ({
    kind: 'unknownInstruction',
    offset,
    byte,
    message: `Unknown instruction at offset ${offset} (0x${toHex(offset, 4)}): no encoding matches byte 0x${toHex(byte)}`
});

export const truncatedInstruction = (
    offset: number,
    required: number,
    available: number
): TruncatedInstructionError => ({
    kind: 'truncatedInstruction',
    offset,
    required,
    available,
    message: `Truncated instruction at offset ${offset} (0x${toHex(offset, 4)}): needs ${required} byte(s), only ${available} available`
});

export const invalidOffset = (offset: number, length: number): InvalidOffsetError => ({
    kind: 'invalidOffset',
    offset,
    length,
    message: `Invalid offset ${offset}: expected a whole number from 0 to ${length}`
});

/**
 * Offsets name a byte boundary inside the stream; `stream.length` itself is the end
 */
export const isStreamOffset = (offset: number, length: number): boolean =>
    Number.isInteger(offset) && offset >= 0 && offset <= length;
