/**
 * Assembly output service
 * Reads raw instruction streams from disk and writes the decoded source back
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { DecodedInstruction, Mnemonic } from '../types';

export interface ProgramInfo {
    instructionCount: number;
    byteCount: number;
    mnemonics: { [mnemonic in Mnemonic]: number };
}

/**
 * Output file path: the input path with the suffix appended
 */
export const getOutputPath = (inputPath: string, suffix: string): string => {
    return `${inputPath}${suffix}`;
};

/**
 * Join rendered lines into file contents, newline-terminated
 */
export const buildAsmSource = (lines: readonly string[]): string => {
    if (lines.length === 0) {
        return '';
    }

    return `${lines.join('\n')}\n`;
};

export const readBinaryFile = async (path: string): Promise<Uint8Array> => {
    const buffer = await readFile(path);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
};

export const writeAsmFile = async (path: string, source: string): Promise<void> => {
    await writeFile(path, source, 'utf8');
};

/**
 * Summarize a decoded program for logging
 */
export const getProgramInfo = (instructions: readonly DecodedInstruction[]): ProgramInfo => {
    const mnemonics = { mov: 0, add: 0 };
    let byteCount = 0;

    for (const instr of instructions) {
        mnemonics[instr.schema.opcode.mnemonic] += 1;
        byteCount += instr.size;
    }

    return { instructionCount: instructions.length, byteCount, mnemonics };
};
