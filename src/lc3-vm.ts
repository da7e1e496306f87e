import { PC_START } from './constants/memory';
import { decode } from './cpu/decoder';
import { execute } from './cpu/executor';
import type { TrapContext, TrapOutcome } from './cpu/traps';
import { formatInstruction } from './disassembler';
import { isUnimplementedOperation, type UnimplementedOperationError } from './errors';
import { Keyboard, type KeyboardSource } from './hardware/keyboard';
import { Memory } from './hardware/memory';
import { RegisterFile } from './hardware/register';
import type { InputChannel, OutputChannel } from './io/channels';
import { parseImage, type ObjectImage } from './loader/image';
import { DEFAULT_VM_OPTIONS, type VmOptions } from './options';
import { hex } from './utils/bits';

export type RunResult =
  | { status: 'halted'; steps: number }
  | { status: 'unimplemented'; error: UnimplementedOperationError; steps: number }
  | { status: 'step-limit'; steps: number };

export class LC3VirtualMachine {
  public readonly memory = new Memory();
  public readonly registers = new RegisterFile();
  public readonly options: VmOptions;

  private halted = false;
  private fault: UnimplementedOperationError | null = null;
  private originSet = false;

  constructor(options: Partial<VmOptions> = {}) {
    this.options = { ...DEFAULT_VM_OPTIONS, ...options };
    this.registers.pc = this.options.pcStart ?? PC_START;
  }

  /** Creates a machine with one object image loaded. Throws LoadError on a malformed image. */
  public static fromImage(image: Uint8Array, options: Partial<VmOptions> = {}): LC3VirtualMachine {
    const parsed = parseImage(image);
    const vm = new LC3VirtualMachine(options);
    vm.loadImage(parsed);
    return vm;
  }

  public get isHalted(): boolean {
    return this.halted;
  }

  /** The error that stopped this machine, if any. */
  public get lastFault(): UnimplementedOperationError | null {
    return this.fault;
  }

  /**
   * Places an image in memory. The image is validated completely before any
   * cell is written. The first image loaded sets the PC to its origin unless
   * `pcStart` was given.
   */
  public loadImage(image: Uint8Array | ObjectImage): ObjectImage {
    const parsed = image instanceof Uint8Array ? parseImage(image) : image;
    this.memory.writeBlock(parsed.origin, parsed.words);
    if (!this.originSet && this.options.pcStart === null) {
      this.registers.pc = parsed.origin;
    }
    this.originSet = true;
    return parsed;
  }

  /**
   * Fetches, decodes and executes one instruction. Throws the
   * unimplemented-operation errors; a machine that has faulted or halted
   * executes nothing further.
   */
  public step(input: InputChannel, output: OutputChannel): TrapOutcome {
    if (this.fault !== null) throw this.fault;
    if (this.halted) return 'halt';

    const address: number = this.registers.pc;
    const instr: number = this.memory.read(address);
    this.registers.pc = address + 1;

    try {
      const instruction = decode(instr, address);
      if (this.options.trace) {
        this.options.logger.debug(`${hex(address)}: ${formatInstruction(instruction, address)}`);
      }
      const outcome = execute(instruction, this.context(input, output), address);
      if (outcome === 'halt') {
        this.halted = true;
      }
      return outcome;
    } catch (e) {
      if (isUnimplementedOperation(e)) {
        /* leave the PC on the faulting instruction */
        this.registers.pc = address;
        this.fault = e;
      }
      throw e;
    }
  }

  /**
   * Runs until HALT, an unimplemented operation or the `maxSteps` bound.
   * With a keyboard source, a waiting key is latched into KBSR/KBDR before
   * each fetch.
   */
  public run(input: InputChannel, output: OutputChannel, keyboard?: KeyboardSource): RunResult {
    const { maxSteps } = this.options;
    const device = keyboard ? new Keyboard(this.memory, keyboard) : null;
    let steps = 0;

    if (this.fault !== null) {
      return { status: 'unimplemented', error: this.fault, steps };
    }

    while (!this.halted) {
      if (maxSteps !== null && steps >= maxSteps) {
        return { status: 'step-limit', steps };
      }
      device?.update();
      try {
        this.step(input, output);
      } catch (e) {
        if (isUnimplementedOperation(e)) {
          return { status: 'unimplemented', error: e, steps };
        }
        throw e;
      }
      steps++;
    }
    return { status: 'halted', steps };
  }

  private context(input: InputChannel, output: OutputChannel): TrapContext {
    return {
      memory: this.memory,
      registers: this.registers,
      input,
      output,
      inPrompt: this.options.inPrompt,
    };
  }
}

/** Loads an object image into a fresh machine. */
export function load(image: Uint8Array, options: Partial<VmOptions> = {}): LC3VirtualMachine {
  return LC3VirtualMachine.fromImage(image, options);
}

export function run(
  vm: LC3VirtualMachine,
  input: InputChannel,
  output: OutputChannel,
  keyboard?: KeyboardSource
): RunResult {
  return vm.run(input, output, keyboard);
}
