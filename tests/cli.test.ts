import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EXIT_CODES, USAGE, parseCliArgs, runCli } from '../src/cli';
import { DEFAULT_CONFIG } from '../src/config';

const exists = async (path: string): Promise<boolean> => {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
};

describe('CLI', () => {
    describe('parseCliArgs', () => {
        it('should require an input file', () => {
            expect(parseCliArgs([])).toEqual({ kind: 'usageError', message: 'Supply the input file path.' });
        });

        it('should map flags onto the config', () => {
            expect(parseCliArgs(['in.bin', '--listing', '--offset', '0x10', '--count', '3'])).toEqual({
                kind: 'run',
                inputPath: 'in.bin',
                config: { ...DEFAULT_CONFIG, listing: true, startOffset: 16, maxInstructions: 3 }
            });
        });

        it('should read the remaining flags', () => {
            const args = parseCliArgs(['--stdout', '--unsigned-displacements', '--verbose', '--suffix', '.asm', 'in.bin']);

            expect(args).toEqual({
                kind: 'run',
                inputPath: 'in.bin',
                config: {
                    ...DEFAULT_CONFIG,
                    stdout: true,
                    signedDisplacements: false,
                    verbose: true,
                    outputSuffix: '.asm'
                }
            });
        });

        it('should reject a flag without its value', () => {
            expect(parseCliArgs(['in.bin', '--offset'])).toEqual({ kind: 'usageError', message: '--offset expects a number' });
            expect(parseCliArgs(['in.bin', '--count', 'many'])).toEqual({ kind: 'usageError', message: '--count expects a number' });
            expect(parseCliArgs(['in.bin', '--suffix'])).toEqual({ kind: 'usageError', message: '--suffix expects a value' });
        });

        it('should reject unknown options and extra files', () => {
            expect(parseCliArgs(['in.bin', '--bogus'])).toEqual({ kind: 'usageError', message: 'Unknown option: --bogus' });
            expect(parseCliArgs(['a.bin', 'b.bin'])).toEqual({ kind: 'usageError', message: 'Expected one input file, got 2' });
        });

        it('should reject invalid configuration', () => {
            const args = parseCliArgs(['in.bin', '--count', '0']);

            expect(args.kind).toBe('usageError');
            if (args.kind === 'usageError') {
                expect(args.message).toMatch(/^Invalid configuration: maxInstructions: /);
            }
        });

        it('should recognise help', () => {
            expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
            expect(parseCliArgs(['in.bin', '-h'])).toEqual({ kind: 'help' });
        });
    });

    describe('runCli', () => {
        let dir: string;
        let logSpy: MockInstance;
        let errorSpy: MockInstance;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'disasm-cli-'));
            logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        });

        afterEach(async () => {
            vi.restoreAllMocks();
            await rm(dir, { recursive: true, force: true });
        });

        const writeInput = async (name: string, bytes: number[]): Promise<string> => {
            const path = join(dir, name);
            await writeFile(path, Buffer.from(bytes));
            return path;
        };

        it('should print usage and exit 2 without arguments', async () => {
            expect(await runCli([])).toBe(EXIT_CODES.usage);
            expect(errorSpy).toHaveBeenCalledWith('[disasm] Supply the input file path.');
            expect(errorSpy).toHaveBeenCalledWith(USAGE);
        });

        it('should print usage and exit 0 for help', async () => {
            expect(await runCli(['--help'])).toBe(EXIT_CODES.success);
            expect(logSpy).toHaveBeenCalledWith(USAGE);
        });

        it('should write the decoded program next to the input', async () => {
            const input = await writeInput('listing.bin', [0x8B, 0xC3, 0xB0, 0x05]);

            expect(await runCli([input])).toBe(EXIT_CODES.success);
            expect(await readFile(`${input}-out-gen.asm`, 'utf8')).toBe('bits 16\nmov ax, bx\nmov al, 5\n');
            expect(logSpy).not.toHaveBeenCalled();
        });

        it('should honour the suffix and listing flags', async () => {
            const input = await writeInput('listing.bin', [0x05, 0x0A, 0x00]);

            expect(await runCli([input, '--suffix', '.lst', '--listing'])).toBe(EXIT_CODES.success);
            expect(await readFile(`${input}.lst`, 'utf8')).toBe(`bits 16\n0000: 05 0A 00${' '.repeat(10)}add ax, 10\n`);
        });

        it('should print to stdout when asked', async () => {
            const input = await writeInput('listing.bin', [0x8B, 0xC3]);
            const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

            expect(await runCli([input, '--stdout'])).toBe(EXIT_CODES.success);
            expect(writeSpy).toHaveBeenCalledWith('bits 16\nmov ax, bx\n');
            expect(await exists(`${input}-out-gen.asm`)).toBe(false);
        });

        it('should exit 1 and write nothing on an unknown instruction', async () => {
            const input = await writeInput('bad.bin', [0x8B, 0xC3, 0xFF]);

            expect(await runCli([input])).toBe(EXIT_CODES.decodeFailure);
            expect(errorSpy).toHaveBeenCalledWith(
                '[disasm] Unknown instruction at offset 2 (0x0002): no encoding matches byte 0xFF'
            );
            expect(errorSpy).toHaveBeenCalledWith('[disasm] Decoded 1 instruction(s) before the failure; no output written');
            expect(await exists(`${input}-out-gen.asm`)).toBe(false);
        });

        it('should name the form of a truncated instruction', async () => {
            const input = await writeInput('short.bin', [0xB8, 0x01]);

            expect(await runCli([input])).toBe(EXIT_CODES.decodeFailure);
            expect(errorSpy).toHaveBeenCalledWith('[disasm] Incomplete MOV immediate to register instruction');
        });

        it('should exit 3 when the input cannot be read', async () => {
            const input = join(dir, 'missing.bin');

            expect(await runCli([input])).toBe(EXIT_CODES.io);
            expect(errorSpy).toHaveBeenCalledTimes(1);
        });

        it('should exit 2 for a start offset past the end', async () => {
            const input = await writeInput('listing.bin', [0x8B, 0xC3]);

            expect(await runCli([input, '--offset', '3'])).toBe(EXIT_CODES.usage);
            expect(errorSpy).toHaveBeenCalledWith(`[disasm] Start offset 3 is past the end of ${input} (2 bytes)`);
        });

        it('should log details when verbose', async () => {
            const input = await writeInput('listing.bin', [0x8B, 0xC3, 0x05, 0x0A, 0x00]);

            expect(await runCli([input, '--verbose'])).toBe(EXIT_CODES.success);
            expect(logSpy).toHaveBeenCalledWith(`[disasm] Read 5 bytes from ${input}`);
            expect(logSpy).toHaveBeenCalledWith('[disasm] Decoded 2 instruction(s), 5 bytes (mov: 1, add: 1)');
            expect(logSpy).toHaveBeenCalledWith('[disasm]   0002  ADD immediate to accumulator');
            expect(logSpy).toHaveBeenCalledWith(`[disasm] Wrote 2 instruction(s) to ${input}-out-gen.asm`);
        });

        it('should keep verbose progress off stdout when printing the assembly', async () => {
            const input = await writeInput('listing.bin', [0x8B, 0xC3]);
            const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

            expect(await runCli([input, '--stdout', '--verbose'])).toBe(EXIT_CODES.success);
            expect(writeSpy).toHaveBeenCalledTimes(1);
            expect(writeSpy).toHaveBeenCalledWith('bits 16\nmov ax, bx\n');
            expect(logSpy).not.toHaveBeenCalled();
            expect(errorSpy).toHaveBeenCalledWith(`[disasm] Read 2 bytes from ${input}`);
            expect(errorSpy).toHaveBeenCalledWith('[disasm] Decoded 1 instruction(s), 2 bytes (mov: 1, add: 0)');
        });
    });
});
