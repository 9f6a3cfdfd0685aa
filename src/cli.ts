import { type DisassemblerConfig, resolveConfig } from './config';
import { renderProgram } from './services/asmRenderer';
import { buildAsmSource, getOutputPath, getProgramInfo, readBinaryFile, writeAsmFile } from './services/asmWriter';
import { describeInstruction } from './services/opcodeCatalog';
import { parseNumericValue, toHex } from './services/numberFormat';
import { decodeStream } from './services/streamDecoder';

export const EXIT_CODES = {
    success: 0,
    decodeFailure: 1,
    usage: 2,
    io: 3,
    defect: 4
} as const;

export const USAGE = [
    'Usage: sim8086-disasm <input-file> [options]',
    '',
    'Options:',
    '  --listing                  prefix each line with its offset and raw bytes',
    '  --stdout                   print the assembly instead of writing a file',
    '  --offset <n>               start decoding at byte offset n',
    '  --count <n>                decode at most n instructions',
    '  --suffix <text>            output file suffix (default "-out-gen.asm")',
    '  --unsigned-displacements   render displacements as unsigned values',
    '  --verbose                  log progress',
    '  --help                     show this message'
].join('\n');

export type CliArgs =
    | { kind: 'run'; inputPath: string; config: DisassemblerConfig }
    | { kind: 'help' }
    | { kind: 'usageError'; message: string };

const log = (message: string): void => {
    console.log(`[disasm] ${message}`);
};

const logError = (message: string): void => {
    console.error(`[disasm] ${message}`);
};

// stdout carries the assembly in --stdout mode, so progress moves to stderr
const progressLogger = (config: DisassemblerConfig) => (message: string): void => {
    if (!config.verbose) return;
    if (config.stdout) {
        logError(message);
    } else {
        log(message);
    }
};

/**
 * Parse command-line arguments (without the node and script entries)
 */
export const parseCliArgs = (argv: readonly string[]): CliArgs => {
    const overrides: Partial<DisassemblerConfig> = {};
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case '--help':
            case '-h':
                return { kind: 'help' };
            case '--listing':
                overrides.listing = true;
                break;
            case '--stdout':
                overrides.stdout = true;
                break;
            case '--unsigned-displacements':
                overrides.signedDisplacements = false;
                break;
            case '--verbose':
                overrides.verbose = true;
                break;
            case '--offset':
            case '--count': {
                const raw = argv[i + 1];
                const value = raw === undefined ? null : parseNumericValue(raw);
                if (value === null) {
                    return { kind: 'usageError', message: `${arg} expects a number` };
                }
                if (arg === '--offset') {
                    overrides.startOffset = value;
                } else {
                    overrides.maxInstructions = value;
                }
                i++;
                break;
            }
            case '--suffix': {
                const raw = argv[i + 1];
                if (raw === undefined) {
                    return { kind: 'usageError', message: '--suffix expects a value' };
                }
                overrides.outputSuffix = raw;
                i++;
                break;
            }
            default:
                if (arg.startsWith('-')) {
                    return { kind: 'usageError', message: `Unknown option: ${arg}` };
                }
                positional.push(arg);
        }
    }

    if (positional.length === 0) {
        return { kind: 'usageError', message: 'Supply the input file path.' };
    }
    if (positional.length > 1) {
        return { kind: 'usageError', message: `Expected one input file, got ${positional.length}` };
    }

    try {
        return { kind: 'run', inputPath: positional[0], config: resolveConfig(overrides) };
    } catch (error) {
        return { kind: 'usageError', message: error instanceof Error ? error.message : String(error) };
    }
};

const describeFailure = (error: unknown): string => {
    return error instanceof Error ? error.message : String(error);
};

/**
 * Run the disassembler and return the process exit code
 */
export const runCli = async (argv: readonly string[]): Promise<number> => {
    const args = parseCliArgs(argv);

    if (args.kind === 'help') {
        console.log(USAGE);
        return EXIT_CODES.success;
    }
    if (args.kind === 'usageError') {
        logError(args.message);
        console.error(USAGE);
        return EXIT_CODES.usage;
    }

    const { inputPath, config } = args;
    const progress = progressLogger(config);

    let stream: Uint8Array;
    try {
        stream = await readBinaryFile(inputPath);
    } catch (error) {
        logError(`Could not read ${inputPath}: ${describeFailure(error)}`);
        return EXIT_CODES.io;
    }

    if (config.startOffset > stream.length) {
        logError(`Start offset ${config.startOffset} is past the end of ${inputPath} (${stream.length} bytes)`);
        return EXIT_CODES.usage;
    }

    progress(`Read ${stream.length} bytes from ${inputPath}`);

    const result = decodeStream(stream, {
        startOffset: config.startOffset,
        maxInstructions: config.maxInstructions
    });

    if (!result.ok) {
        logError(result.error.message);
        if (result.error.kind === 'truncatedInstruction') {
            const form = describeInstruction(stream[result.error.offset]);
            if (form) logError(`Incomplete ${form} instruction`);
        }
        logError(`Decoded ${result.instructions.length} instruction(s) before the failure; no output written`);
        return EXIT_CODES.decodeFailure;
    }

    const lines = renderProgram(result.instructions, {
        header: config.header,
        listing: config.listing,
        signedDisplacements: config.signedDisplacements
    });
    const source = buildAsmSource(lines);

    if (config.verbose) {
        const info = getProgramInfo(result.instructions);
        progress(`Decoded ${info.instructionCount} instruction(s), ${info.byteCount} bytes (mov: ${info.mnemonics.mov}, add: ${info.mnemonics.add})`);
        for (const instr of result.instructions) {
            progress(`  ${toHex(instr.offset, 4)}  ${instr.schema.description}`);
        }
    }

    if (config.stdout) {
        process.stdout.write(source);
        return EXIT_CODES.success;
    }

    const outputPath = getOutputPath(inputPath, config.outputSuffix);
    try {
        await writeAsmFile(outputPath, source);
    } catch (error) {
        logError(`Could not write ${outputPath}: ${describeFailure(error)}`);
        return EXIT_CODES.io;
    }

    progress(`Wrote ${result.instructions.length} instruction(s) to ${outputPath}`);
    return EXIT_CODES.success;
};
