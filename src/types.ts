export type Mnemonic = 'mov' | 'add';

export type OperandSize = 'byte' | 'word';

// ===== ENCODING CATALOG =====

export interface FieldLocator {
  readonly byteIndex: number;
  readonly mask: number;
  readonly shift: number;
}

export interface OpcodeDescriptor {
  readonly pattern: number;
  readonly width: number;      // significant high bits of the first byte (4-8)
  readonly mnemonic: Mnemonic;
  readonly baseSize: number;   // bytes before any displacement/immediate
}

interface ModRmFields {
  readonly mod: FieldLocator;
  readonly rm: FieldLocator;
  readonly dispLo: FieldLocator;
  readonly dispHi: FieldLocator;
}

export interface RegMemWithRegFields extends ModRmFields {
  readonly kind: 'regMemWithReg';
  readonly d: FieldLocator;
  readonly w: FieldLocator;
  readonly reg: FieldLocator;
}

export interface SegmentRegMemFields extends ModRmFields {
  readonly kind: 'segmentRegMem';
  readonly d: FieldLocator;
  readonly sr: FieldLocator;
}

export interface ImmediateToRegMemFields extends ModRmFields {
  readonly kind: 'immediateToRegMem';
  readonly w: FieldLocator;
  readonly s?: FieldLocator;   // decoded, never applied
}

export interface ImmediateToRegFields {
  readonly kind: 'immediateToReg';
  readonly w: FieldLocator;
  readonly reg: FieldLocator;
}

export interface AccumulatorMemoryFields {
  readonly kind: 'accumulatorMemory';
  readonly d: FieldLocator;
  readonly w: FieldLocator;
  readonly addrLo: FieldLocator;
  readonly addrHi: FieldLocator;
}

export interface ImmediateToAccumulatorFields {
  readonly kind: 'immediateToAccumulator';
  readonly w: FieldLocator;
}

export type RegisterFormFields = RegMemWithRegFields | SegmentRegMemFields;

export type ModRmLayout = RegisterFormFields | ImmediateToRegMemFields;

export type FieldLayout =
  | ModRmLayout
  | ImmediateToRegFields
  | AccumulatorMemoryFields
  | ImmediateToAccumulatorFields;

export interface InstructionSchema {
  readonly description: string;   // e.g. "MOV register/memory to/from register"
  readonly opcode: OpcodeDescriptor;
  readonly fields: FieldLayout;
  readonly hasData: boolean;      // trailing immediate data follows
  readonly accumulator: boolean;  // operand 0 is implicitly AL/AX
}

// ===== DECODED INSTRUCTIONS =====

export type DisplacementSize = 0 | 1 | 2;

export type InstructionShape =
  | { readonly kind: 'registerToRegister'; readonly fields: RegisterFormFields }
  | { readonly kind: 'memory'; readonly fields: RegisterFormFields }
  | { readonly kind: 'directAddress'; readonly fields: RegisterFormFields }
  | { readonly kind: 'immediateToMemory'; readonly fields: ImmediateToRegMemFields }
  | { readonly kind: 'immediateToRegister'; readonly fields: ImmediateToRegFields }
  | { readonly kind: 'accumulatorDirect'; readonly fields: AccumulatorMemoryFields }
  | { readonly kind: 'immediateToAccumulator'; readonly fields: ImmediateToAccumulatorFields };

export interface DecodedInstruction {
  readonly schema: InstructionSchema;
  readonly shape: InstructionShape;
  readonly offset: number;        // position of the first byte in the stream
  readonly bytes: Uint8Array;     // exactly `size` bytes
  readonly size: number;
  readonly displacementSize: DisplacementSize;
  readonly dataStart: number | null;  // null when the form carries no immediate
}

export interface InstructionSize {
  total: number;
  displacementSize: DisplacementSize;
}

export interface DecodeStep {
  instruction: DecodedInstruction;
  consumed: number;
}

// ===== OPERANDS =====

export type EffectiveAddress =
  | { readonly kind: 'direct'; readonly address: number }
  | { readonly kind: 'based'; readonly registers: readonly string[]; readonly displacement: number };

export type Operand =
  | { readonly kind: 'register'; readonly name: string }
  | { readonly kind: 'memory'; readonly address: EffectiveAddress }
  | { readonly kind: 'immediate'; readonly value: number; readonly size: OperandSize | null };

export interface RenderOptions {
  signedDisplacements: boolean;
}

// ===== ERRORS =====

export interface UnknownInstructionError {
  kind: 'unknownInstruction';
  offset: number;
  byte: number;
  message: string;
}

export interface TruncatedInstructionError {
  kind: 'truncatedInstruction';
  offset: number;
  required: number;
  available: number;
  message: string;
}

export interface InvalidOffsetError {
  kind: 'invalidOffset';
  offset: number;
  length: number;
  message: string;
}

export type DecodeError = UnknownInstructionError | TruncatedInstructionError | InvalidOffsetError;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export type StreamDecodeResult =
  | { ok: true; instructions: DecodedInstruction[]; endOffset: number }
  | { ok: false; instructions: DecodedInstruction[]; endOffset: number; error: DecodeError };
