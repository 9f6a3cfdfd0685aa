// 8086 MOV and ADD encodings
// Entries are checked in order: the first whose opcode bits match wins

import type { FieldLayout, InstructionSchema, Mnemonic, OpcodeDescriptor } from '../types';
import {
    ADDR_HI,
    ADDR_LO,
    DISP_HI,
    DISP_LO,
    D_FIELD,
    MOD_FIELD,
    REG_FIELD,
    REG_FIELD_OPCODE,
    RM_FIELD,
    SR_FIELD,
    S_FIELD,
    W_FIELD,
    W_FIELD_IMMEDIATE_REG
} from './fieldLocator';

const opcode = (pattern: number, width: number, mnemonic: Mnemonic, baseSize: number): OpcodeDescriptor =>
    Object.freeze({ pattern, width, mnemonic, baseSize });

const schema = (
    description: string,
    descriptor: OpcodeDescriptor,
    fields: FieldLayout,
    flags: { hasData?: boolean; accumulator?: boolean } = {}
): InstructionSchema => Object.freeze({
    description,
    opcode: descriptor,
    fields: Object.freeze(fields),
    hasData: flags.hasData ?? false,
    accumulator: flags.accumulator ?? false
});

const modRm = { mod: MOD_FIELD, rm: RM_FIELD, dispLo: DISP_LO, dispHi: DISP_HI } as const;

export const INSTRUCTION_CATALOG: readonly InstructionSchema[] = Object.freeze([
    schema(
        'MOV register/memory to/from register',
        opcode(0b100010, 6, 'mov', 2),
        { kind: 'regMemWithReg', d: D_FIELD, w: W_FIELD, reg: REG_FIELD, ...modRm }
    ),
    schema(
        'MOV immediate to register/memory',
        opcode(0b1100011, 7, 'mov', 2),
        { kind: 'immediateToRegMem', w: W_FIELD, ...modRm },
        { hasData: true }
    ),
    schema(
        'MOV immediate to register',
        opcode(0b1011, 4, 'mov', 1),
        { kind: 'immediateToReg', w: W_FIELD_IMMEDIATE_REG, reg: REG_FIELD_OPCODE },
        { hasData: true }
    ),
    schema(
        'MOV memory to accumulator',
        opcode(0b1010000, 7, 'mov', 3),
        { kind: 'accumulatorMemory', d: D_FIELD, w: W_FIELD, addrLo: ADDR_LO, addrHi: ADDR_HI },
        { accumulator: true }
    ),
    schema(
        'MOV accumulator to memory',
        opcode(0b1010001, 7, 'mov', 3),
        { kind: 'accumulatorMemory', d: D_FIELD, w: W_FIELD, addrLo: ADDR_LO, addrHi: ADDR_HI },
        { accumulator: true }
    ),
    schema(
        'MOV register/memory to segment register',
        opcode(0b10001110, 8, 'mov', 2),
        { kind: 'segmentRegMem', d: D_FIELD, sr: SR_FIELD, ...modRm }
    ),
    schema(
        'MOV segment register to register/memory',
        opcode(0b10001100, 8, 'mov', 2),
        { kind: 'segmentRegMem', d: D_FIELD, sr: SR_FIELD, ...modRm }
    ),
    schema(
        'ADD register/memory with register to either',
        opcode(0b000000, 6, 'add', 2),
        { kind: 'regMemWithReg', d: D_FIELD, w: W_FIELD, reg: REG_FIELD, ...modRm }
    ),
    schema(
        'ADD immediate to register/memory',
        opcode(0b100000, 6, 'add', 2),
        { kind: 'immediateToRegMem', s: S_FIELD, w: W_FIELD, ...modRm },
        { hasData: true }
    ),
    schema(
        'ADD immediate to accumulator',
        opcode(0b0000010, 7, 'add', 1),
        { kind: 'immediateToAccumulator', w: W_FIELD },
        { hasData: true, accumulator: true }
    )
]);

/**
 * Check whether the high `width` bits of a byte equal the opcode pattern
 */
export const opcodeMatches = (descriptor: OpcodeDescriptor, byte: number): boolean => {
    return (byte >> (8 - descriptor.width)) === descriptor.pattern;
};

/**
 * Find the first catalog entry whose opcode matches the leading byte
 */
export const matchSchema = (
    byte: number,
    catalog: readonly InstructionSchema[] = INSTRUCTION_CATALOG
): InstructionSchema | null => {
    for (const entry of catalog) {
        if (opcodeMatches(entry.opcode, byte)) {
            return entry;
        }
    }

    return null;
};

/**
 * Describe the encoding form a leading byte selects, for diagnostics
 */
export const describeInstruction = (byte: number): string | null => {
    return matchSchema(byte)?.description ?? null;
};
