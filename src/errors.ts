import { hex } from './utils/bits';

export type LoadErrorCode = 'EMPTY_IMAGE' | 'ODD_LENGTH' | 'NO_PROGRAM_WORDS' | 'IMAGE_TOO_LONG';

export class VmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'VmError';
  }
}

/** A malformed object image. Raised before anything is written to memory. */
export class LoadError extends VmError {
  constructor(
    public readonly reason: LoadErrorCode,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, reason, context);
    this.name = 'LoadError';
  }
}

export class UnimplementedOpcodeError extends VmError {
  constructor(
    public readonly opcode: number,
    public readonly instr: number,
    public readonly address: number
  ) {
    super(
      `Unimplemented opcode ${opcode.toString(2).padStart(4, '0')} (instruction ${hex(instr)}) at ${hex(address)}`,
      'UNIMPLEMENTED_OPCODE',
      { opcode, instr, address }
    );
    this.name = 'UnimplementedOpcodeError';
  }
}

export class UnimplementedTrapError extends VmError {
  constructor(
    public readonly vector: number,
    public readonly address: number
  ) {
    super(`Unimplemented trap ${hex(vector, 2)} at ${hex(address)}`, 'UNIMPLEMENTED_TRAP', {
      vector,
      address,
    });
    this.name = 'UnimplementedTrapError';
  }
}

export type UnimplementedOperationError = UnimplementedOpcodeError | UnimplementedTrapError;

export function isUnimplementedOperation(e: unknown): e is UnimplementedOperationError {
  return e instanceof UnimplementedOpcodeError || e instanceof UnimplementedTrapError;
}
