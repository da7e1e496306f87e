// Machine and run loop
export { LC3VirtualMachine, load, run } from './lc3-vm';
export type { RunResult } from './lc3-vm';
export { DEFAULT_VM_OPTIONS } from './options';
export type { Logger, VmOptions } from './options';

// Hardware
export { Memory } from './hardware/memory';
export { RegisterFile, Register, ConditionFlag } from './hardware/register';
export { Keyboard, ScriptedKeyboard } from './hardware/keyboard';
export type { KeyboardSource } from './hardware/keyboard';
export { MEMORY_SIZE, PC_START, KEY_READY, MemoryMappedRegister } from './constants/memory';
export { OpCode } from './constants/opcodes';
export { Trap, TRAP_NAMES } from './constants/traps';

// Instructions
export { decode } from './cpu/decoder';
export { execute } from './cpu/executor';
export { handleTrap } from './cpu/traps';
export type { TrapContext, TrapOutcome } from './cpu/traps';
export type { Instruction, Operand, Mnemonic } from './cpu/instruction';
export { disassemble, disassembleBlock, formatInstruction } from './disassembler';

// Loading and I/O
export { parseImage } from './loader/image';
export type { ObjectImage } from './loader/image';
export { ScriptedInput, CapturedOutput } from './io/channels';
export type { InputChannel, OutputChannel } from './io/channels';
export { TerminalInput, StdoutOutput } from './io/terminal';
export type { TerminalInputOptions } from './io/terminal';

// Errors
export {
  VmError,
  LoadError,
  UnimplementedOpcodeError,
  UnimplementedTrapError,
  isUnimplementedOperation,
} from './errors';
export type { LoadErrorCode, UnimplementedOperationError } from './errors';

// Utilities
export { signExtend, toSigned, hex } from './utils/bits';
