import { isTrap, Trap } from '../constants/traps';
import { UnimplementedTrapError } from '../errors';
import type { Memory } from '../hardware/memory';
import { Register, type RegisterFile } from '../hardware/register';
import type { InputChannel, OutputChannel } from '../io/channels';

export interface TrapContext {
  memory: Memory;
  registers: RegisterFile;
  input: InputChannel;
  output: OutputChannel;
  /** Prompt written by IN before it reads. */
  inPrompt: string;
}

export type TrapOutcome = 'continue' | 'halt';

/** End of input reads as NUL so programs can keep looping on input. */
function readChar(input: InputChannel): number {
  const c = input.read();
  return c === null ? 0 : c & 0xff;
}

function putString(ctx: TrapContext, packed: boolean): void {
  let addr: number = ctx.registers.get(Register.R_R0);
  const buf: number[] = [];

  for (let word = ctx.memory.read(addr); word !== 0; word = ctx.memory.read(++addr)) {
    if (!packed) {
      /* one char per word */
      buf.push(word & 0xff);
      continue;
    }
    /* two chars per word, low byte first; either byte can end the string */
    const char1 = word & 0xff;
    if (char1 === 0) break;
    buf.push(char1);
    const char2 = word >> 8;
    if (char2 === 0) break;
    buf.push(char2);
  }
  ctx.output.write(buf);
}

/**
 * Runs the service routine for a TRAP vector. The routines are emulated here
 * directly instead of through a trap vector table in memory.
 */
export function handleTrap(vector: number, ctx: TrapContext, address: number): TrapOutcome {
  if (!isTrap(vector)) {
    throw new UnimplementedTrapError(vector, address);
  }

  switch (vector) {
    case Trap.TRAP_GETC: {
      /* read a single ASCII char */
      ctx.registers.set(Register.R_R0, readChar(ctx.input));
      break;
    }
    case Trap.TRAP_OUT: {
      ctx.output.write([ctx.registers.get(Register.R_R0) & 0xff]);
      break;
    }
    case Trap.TRAP_PUTS: {
      putString(ctx, false);
      break;
    }
    case Trap.TRAP_IN: {
      if (ctx.inPrompt !== '') {
        ctx.output.write(Array.from(Buffer.from(ctx.inPrompt, 'latin1')));
      }
      const c = readChar(ctx.input);
      if (c !== 0) {
        ctx.output.write([c]);
      }
      ctx.registers.set(Register.R_R0, c);
      break;
    }
    case Trap.TRAP_PUTSP: {
      putString(ctx, true);
      break;
    }
    case Trap.TRAP_HALT: {
      return 'halt';
    }
  }
  return 'continue';
}
