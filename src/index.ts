export * from './types';
export { DEFAULT_CONFIG, resolveConfig, type DisassemblerConfig } from './config';
export { DecoderDefectError } from './services/decodeErrors';
export { readField } from './services/fieldLocator';
export { INSTRUCTION_CATALOG, describeInstruction, matchSchema, opcodeMatches } from './services/opcodeCatalog';
export { calculateSize, displacementSize } from './services/sizeCalculator';
export { buildInstruction, classifyShape, decodeInstruction } from './services/instructionBuilder';
export { resolveOperands } from './services/operandResolver';
export { formatListingLine, renderInstruction, renderOperand, renderProgram } from './services/asmRenderer';
export { decodeStream, type StreamDecodeOptions } from './services/streamDecoder';
