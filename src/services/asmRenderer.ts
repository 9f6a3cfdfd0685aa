import type { DecodedInstruction, EffectiveAddress, Operand, RenderOptions } from '../types';
import { toHex } from './numberFormat';
import { DEFAULT_RENDER_OPTIONS, resolveOperands } from './operandResolver';

export interface ProgramRenderOptions extends RenderOptions {
    header: string;
    listing: boolean;
}

export const DEFAULT_PROGRAM_OPTIONS: ProgramRenderOptions = {
    ...DEFAULT_RENDER_OPTIONS,
    header: 'bits 16',
    listing: false
};

// Widest instruction is 6 bytes: "C7 86 00 01 34 12"
const BYTES_COLUMN_WIDTH = 17;

export const renderEffectiveAddress = (address: EffectiveAddress): string => {
    if (address.kind === 'direct') {
        return `[${address.address}]`;
    }

    let text = address.registers.join(' + ');
    if (address.displacement > 0) {
        text += ` + ${address.displacement}`;
    } else if (address.displacement < 0) {
        text += ` - ${-address.displacement}`;
    }

    return `[${text}]`;
};

export const renderOperand = (operand: Operand): string => {
    switch (operand.kind) {
        case 'register':
            return operand.name;
        case 'memory':
            return renderEffectiveAddress(operand.address);
        case 'immediate':
            return operand.size ? `${operand.size} ${operand.value}` : `${operand.value}`;
    }
};

/**
 * Render one instruction as "<mnemonic> <destination>, <source>"
 */
export const renderInstruction = (
    instr: DecodedInstruction,
    options: RenderOptions = DEFAULT_RENDER_OPTIONS
): string => {
    const [destination, source] = resolveOperands(instr, options);
    return `${instr.schema.opcode.mnemonic} ${renderOperand(destination)}, ${renderOperand(source)}`;
};

/**
 * Format an instruction with its stream offset and raw bytes
 */
export const formatListingLine = (instr: DecodedInstruction, text: string): string => {
    const offsetStr = toHex(instr.offset, 4);
    const bytesStr = Array.from(instr.bytes, b => toHex(b)).join(' ').padEnd(BYTES_COLUMN_WIDTH);
    return `${offsetStr}: ${bytesStr} ${text}`;
};

/**
 * Render a decoded program: the header line followed by one line per instruction
 */
export const renderProgram = (
    instructions: readonly DecodedInstruction[],
    options: ProgramRenderOptions = DEFAULT_PROGRAM_OPTIONS
): string[] => {
    const lines = instructions.map(instr => {
        const text = renderInstruction(instr, options);
        return options.listing ? formatListingLine(instr, text) : text;
    });

    return [options.header, ...lines];
};
