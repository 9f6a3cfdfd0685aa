import type {
    DecodeResult,
    DecodeStep,
    DecodedInstruction,
    FieldLayout,
    InstructionSchema,
    InstructionShape,
    InstructionSize
} from '../types';
import { invalidOffset, isStreamOffset, truncatedInstruction, unknownInstruction } from './decodeErrors';
import { readField } from './fieldLocator';
import { INSTRUCTION_CATALOG, matchSchema } from './opcodeCatalog';
import { calculateSize } from './sizeCalculator';

/**
 * Decide which operand shape an instruction takes, once, from its layout and mod/rm
 */
export const classifyShape = (fields: FieldLayout, window: Uint8Array): InstructionShape => {
    switch (fields.kind) {
        case 'regMemWithReg':
        case 'segmentRegMem': {
            const mod = readField(fields.mod, window);
            const rm = readField(fields.rm, window);

            if (mod === 0b11) return { kind: 'registerToRegister', fields };
            if (mod === 0b00 && rm === 0b110) return { kind: 'directAddress', fields };
            return { kind: 'memory', fields };
        }
        case 'immediateToRegMem':
            return { kind: 'immediateToMemory', fields };
        case 'immediateToReg':
            return { kind: 'immediateToRegister', fields };
        case 'accumulatorMemory':
            return { kind: 'accumulatorDirect', fields };
        case 'immediateToAccumulator':
            return { kind: 'immediateToAccumulator', fields };
    }
};

/**
 * Copy exactly `size.total` bytes out of the stream and wrap them.
 * The caller has already checked that the stream holds that many bytes.
 */
export const buildInstruction = (
    schema: InstructionSchema,
    stream: Uint8Array,
    offset: number,
    size: InstructionSize
): DecodedInstruction => {
    const bytes = stream.slice(offset, offset + size.total);

    return Object.freeze({
        schema,
        shape: Object.freeze(classifyShape(schema.fields, bytes)),
        offset,
        bytes,
        size: size.total,
        displacementSize: size.displacementSize,
        dataStart: schema.hasData ? schema.opcode.baseSize + size.displacementSize : null
    });
};

/**
 * Decode the single instruction starting at `offset`
 */
export const decodeInstruction = (
    stream: Uint8Array,
    offset: number,
    catalog: readonly InstructionSchema[] = INSTRUCTION_CATALOG
): DecodeResult<DecodeStep> => {
    if (!isStreamOffset(offset, stream.length)) {
        return { ok: false, error: invalidOffset(offset, stream.length) };
    }
    if (offset === stream.length) {
        return { ok: false, error: truncatedInstruction(offset, 1, 0) };
    }

    const firstByte = stream[offset];
    const schema = matchSchema(firstByte, catalog);
    if (!schema) {
        return { ok: false, error: unknownInstruction(offset, firstByte) };
    }

    const window = stream.subarray(offset);
    const size = calculateSize(schema, window, offset);
    if (!size.ok) {
        return size;
    }

    if (size.value.total > window.length) {
        return { ok: false, error: truncatedInstruction(offset, size.value.total, window.length) };
    }

    const instruction = buildInstruction(schema, stream, offset, size.value);
    return { ok: true, value: { instruction, consumed: instruction.size } };
};
