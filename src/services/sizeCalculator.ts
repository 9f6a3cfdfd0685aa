import type {
    DecodeResult,
    DisplacementSize,
    FieldLayout,
    FieldLocator,
    InstructionSchema,
    InstructionSize,
    ModRmLayout
} from '../types';
import { DecoderDefectError, truncatedInstruction } from './decodeErrors';
import { readField } from './fieldLocator';

/**
 * Narrow a layout to the forms that carry a mod-reg-rm byte
 */
export const modRmLayout = (fields: FieldLayout): ModRmLayout | null => {
    switch (fields.kind) {
        case 'regMemWithReg':
        case 'segmentRegMem':
        case 'immediateToRegMem':
            return fields;
        default:
            return null;
    }
};

/**
 * The `w` field of a layout, if it has one (segment moves are always 16-bit)
 */
export const widthField = (fields: FieldLayout): FieldLocator | null => {
    return fields.kind === 'segmentRegMem' ? null : fields.w;
};

/**
 * Bytes of displacement following the mod-reg-rm byte
 * mod=00 with rm=110 is a 16-bit direct address rather than "no displacement"
 */
export const displacementSize = (mod: number, rm: number): DisplacementSize => {
    switch (mod) {
        case 0b00: return rm === 0b110 ? 2 : 0;
        case 0b01: return 1;
        case 0b10: return 2;
        case 0b11: return 0;
    }

    throw new DecoderDefectError(
        'unknownDisplacementSize',
        `Unknown displacement size for mod=${mod}, rm=${rm}`
    );
};

/**
 * Compute the full length of the instruction that starts at window[0].
 * Reads only the opcode byte and, for mod-reg-rm forms, the byte after it.
 */
export const calculateSize = (
    schema: InstructionSchema,
    window: Uint8Array,
    offset: number = 0
): DecodeResult<InstructionSize> => {
    if (window.length < 1) {
        return { ok: false, error: truncatedInstruction(offset, 1, 0) };
    }

    let total = schema.opcode.baseSize;
    let dispSize: DisplacementSize = 0;

    const layout = modRmLayout(schema.fields);
    if (layout) {
        if (window.length < 2) {
            return { ok: false, error: truncatedInstruction(offset, 2, window.length) };
        }

        dispSize = displacementSize(readField(layout.mod, window), readField(layout.rm, window));
        total += dispSize;
    }

    if (schema.hasData) {
        total += 1;

        const w = widthField(schema.fields);
        if (w && readField(w, window[0]) === 1) {
            total += 1;
        }
    }

    return { ok: true, value: { total, displacementSize: dispSize } };
};
