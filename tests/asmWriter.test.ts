import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    buildAsmSource,
    getOutputPath,
    getProgramInfo,
    readBinaryFile,
    writeAsmFile
} from '../src/services/asmWriter';
import { decodeStream } from '../src/services/streamDecoder';

describe('ASM Writer', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'asm-writer-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should append the suffix to the input path', () => {
        expect(getOutputPath('listings/test.bin', '-out-gen.asm')).toBe('listings/test.bin-out-gen.asm');
    });

    it('should join lines with a trailing newline', () => {
        expect(buildAsmSource(['bits 16', 'mov ax, bx'])).toBe('bits 16\nmov ax, bx\n');
        expect(buildAsmSource([])).toBe('');
    });

    it('should read a binary file as bytes', async () => {
        const path = join(dir, 'input.bin');
        await writeFile(path, Buffer.from([0x8B, 0xC3, 0xB0, 0x05]));

        const bytes = await readBinaryFile(path);
        expect(Array.from(bytes)).toEqual([0x8B, 0xC3, 0xB0, 0x05]);
    });

    it('should reject a missing input file', async () => {
        await expect(readBinaryFile(join(dir, 'missing.bin'))).rejects.toThrow(/ENOENT/);
    });

    it('should write assembly source', async () => {
        const path = join(dir, 'out.asm');
        await writeAsmFile(path, 'bits 16\nmov ax, bx\n');

        expect(await readFile(path, 'utf8')).toBe('bits 16\nmov ax, bx\n');
    });

    it('should summarize a decoded program', () => {
        const { instructions } = decodeStream(new Uint8Array([0x8B, 0xC3, 0x05, 0x0A, 0x00, 0xB0, 0x05]));

        expect(getProgramInfo(instructions)).toEqual({
            instructionCount: 3,
            byteCount: 7,
            mnemonics: { mov: 2, add: 1 }
        });
    });
});
