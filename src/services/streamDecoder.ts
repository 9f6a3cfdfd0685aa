import type { DecodedInstruction, StreamDecodeResult } from '../types';
import { invalidOffset, isStreamOffset } from './decodeErrors';
import { decodeInstruction } from './instructionBuilder';

export interface StreamDecodeOptions {
    startOffset?: number;
    maxInstructions?: number | null;
}

/**
 * Decode instructions back to back from `startOffset` until the stream ends,
 * `maxInstructions` have been read, or an instruction fails to decode.
 * Instructions decoded before a failure are returned with the error.
 */
export const decodeStream = (
    stream: Uint8Array,
    options: StreamDecodeOptions = {}
): StreamDecodeResult => {
    const { startOffset = 0, maxInstructions = null } = options;
    const instructions: DecodedInstruction[] = [];

    if (!isStreamOffset(startOffset, stream.length)) {
        return { ok: false, instructions, endOffset: startOffset, error: invalidOffset(startOffset, stream.length) };
    }

    let offset = startOffset;

    while (offset < stream.length) {
        if (maxInstructions !== null && instructions.length >= maxInstructions) break;

        const step = decodeInstruction(stream, offset);
        if (!step.ok) {
            return { ok: false, instructions, endOffset: offset, error: step.error };
        }

        instructions.push(step.value.instruction);
        offset += step.value.consumed;
    }

    return { ok: true, instructions, endOffset: offset };
};
