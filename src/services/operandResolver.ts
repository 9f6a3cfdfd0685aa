import type {
    DecodedInstruction,
    EffectiveAddress,
    FieldLocator,
    ModRmLayout,
    Operand,
    OperandSize,
    RegisterFormFields,
    RenderOptions
} from '../types';
import { DecoderDefectError } from './decodeErrors';
import { readField } from './fieldLocator';
import { signedByte, signedWord, toWord } from './numberFormat';

export const WORD_REGISTERS = ['ax', 'cx', 'dx', 'bx', 'sp', 'bp', 'si', 'di'] as const;
export const BYTE_REGISTERS = ['al', 'cl', 'dl', 'bl', 'ah', 'ch', 'dh', 'bh'] as const;
export const SEGMENT_REGISTERS = ['es', 'cs', 'ss', 'ds'] as const;

// Base registers of an effective address, indexed by rm
export const EFFECTIVE_ADDRESS_BASES: readonly (readonly string[])[] = [
    ['bx', 'si'],
    ['bx', 'di'],
    ['bp', 'si'],
    ['bp', 'di'],
    ['si'],
    ['di'],
    ['bp'],
    ['bx']
];

export const DEFAULT_RENDER_OPTIONS: RenderOptions = { signedDisplacements: true };

const read = (instr: DecodedInstruction, locator: FieldLocator): number => readField(locator, instr.bytes);

const isWide = (instr: DecodedInstruction, w: FieldLocator): boolean => read(instr, w) === 1;

const register = (name: string): Operand => ({ kind: 'register', name });

export const registerName = (index: number, wide: boolean): string => {
    return wide ? WORD_REGISTERS[index] : BYTE_REGISTERS[index];
};

/**
 * Order two operands by the `d` bit: 1 puts the reg side first
 */
const byDirection = (d: number, regSide: Operand, rmSide: Operand): [Operand, Operand] => {
    return d === 1 ? [regSide, rmSide] : [rmSide, regSide];
};

/**
 * Displacement following the mod-reg-rm byte, or 0 when there is none
 */
export const readDisplacement = (
    instr: DecodedInstruction,
    fields: ModRmLayout,
    signed: boolean
): number => {
    switch (instr.displacementSize) {
        case 0:
            return 0;
        case 1: {
            const value = read(instr, fields.dispLo);
            return signed ? signedByte(value) : value;
        }
        case 2: {
            const value = toWord(read(instr, fields.dispLo), read(instr, fields.dispHi));
            return signed ? signedWord(value) : value;
        }
    }
};

export const effectiveAddress = (
    instr: DecodedInstruction,
    fields: ModRmLayout,
    options: RenderOptions
): EffectiveAddress => {
    const mod = read(instr, fields.mod);
    const rm = read(instr, fields.rm);

    if (mod === 0b00 && rm === 0b110) {
        return { kind: 'direct', address: toWord(read(instr, fields.dispLo), read(instr, fields.dispHi)) };
    }

    return {
        kind: 'based',
        registers: EFFECTIVE_ADDRESS_BASES[rm],
        displacement: readDisplacement(instr, fields, options.signedDisplacements)
    };
};

/**
 * The rm side: a register when mod=11, memory otherwise
 */
const rmOperand = (
    instr: DecodedInstruction,
    fields: ModRmLayout,
    wide: boolean,
    options: RenderOptions
): Operand => {
    if (read(instr, fields.mod) === 0b11) {
        return register(registerName(read(instr, fields.rm), wide));
    }

    return { kind: 'memory', address: effectiveAddress(instr, fields, options) };
};

/**
 * The reg side of a register form: a general register, or a segment register
 */
const regOperand = (instr: DecodedInstruction, fields: RegisterFormFields): Operand => {
    if (fields.kind === 'segmentRegMem') {
        return register(SEGMENT_REGISTERS[read(instr, fields.sr)]);
    }

    return register(registerName(read(instr, fields.reg), isWide(instr, fields.w)));
};

const rmIsWide = (instr: DecodedInstruction, fields: RegisterFormFields): boolean => {
    return fields.kind === 'segmentRegMem' ? true : isWide(instr, fields.w);
};

/**
 * Immediate data, 16-bit little-endian when `wide`
 */
export const readImmediate = (instr: DecodedInstruction, wide: boolean): number => {
    if (instr.dataStart === null) {
        throw new DecoderDefectError(
            'missingImmediateData',
            `${instr.schema.description} carries no immediate data`
        );
    }

    const lo = instr.bytes[instr.dataStart];
    return wide ? toWord(lo, instr.bytes[instr.dataStart + 1]) : lo;
};

const immediate = (value: number, size: OperandSize | null): Operand => ({ kind: 'immediate', value, size });

const directAddress = (instr: DecodedInstruction, lo: FieldLocator, hi: FieldLocator): Operand => ({
    kind: 'memory',
    address: { kind: 'direct', address: toWord(read(instr, lo), read(instr, hi)) }
});

/**
 * Resolve the destination and source operands of a decoded instruction
 */
export const resolveOperands = (
    instr: DecodedInstruction,
    options: RenderOptions = DEFAULT_RENDER_OPTIONS
): [Operand, Operand] => {
    const { shape } = instr;

    switch (shape.kind) {
        case 'registerToRegister':
        case 'memory':
        case 'directAddress': {
            const { fields } = shape;
            const rmSide = rmOperand(instr, fields, rmIsWide(instr, fields), options);
            return byDirection(read(instr, fields.d), regOperand(instr, fields), rmSide);
        }

        case 'immediateToMemory': {
            const { fields } = shape;
            const wide = isWide(instr, fields.w);
            const destination = rmOperand(instr, fields, wide, options);
            // A register destination already implies the size
            const size: OperandSize | null = destination.kind === 'memory' ? (wide ? 'word' : 'byte') : null;
            return [destination, immediate(readImmediate(instr, wide), size)];
        }

        case 'immediateToRegister': {
            const { fields } = shape;
            const wide = isWide(instr, fields.w);
            return [
                register(registerName(read(instr, fields.reg), wide)),
                immediate(readImmediate(instr, wide), null)
            ];
        }

        case 'accumulatorDirect': {
            const { fields } = shape;
            const accumulator = register(registerName(0, isWide(instr, fields.w)));
            const memory = directAddress(instr, fields.addrLo, fields.addrHi);
            return read(instr, fields.d) === 0 ? [accumulator, memory] : [memory, accumulator];
        }

        case 'immediateToAccumulator': {
            const wide = isWide(instr, shape.fields.w);
            return [register(registerName(0, wide)), immediate(readImmediate(instr, wide), null)];
        }
    }
};
