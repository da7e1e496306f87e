import { isTrap } from '../constants/traps';
import { UnimplementedTrapError } from '../errors';
import { ConditionFlag, Register } from '../hardware/register';
import type { Instruction, Operand } from './instruction';
import { handleTrap, type TrapContext, type TrapOutcome } from './traps';

function operandValue(ctx: TrapContext, operand: Operand): number {
  return operand.mode === 'immediate' ? operand.imm : ctx.registers.get(operand.sr2);
}

/**
 * Applies one instruction. The PC in `ctx.registers` already points past the
 * instruction, so every PC-relative offset counts from the next word.
 * `address` is where the instruction was fetched from.
 */
export function execute(instruction: Instruction, ctx: TrapContext, address: number): TrapOutcome {
  const { registers: reg, memory } = ctx;

  switch (instruction.op) {
    case 'ADD': {
      reg.setWithFlags(instruction.dr, reg.get(instruction.sr1) + operandValue(ctx, instruction.operand));
      break;
    }
    case 'AND': {
      reg.setWithFlags(instruction.dr, reg.get(instruction.sr1) & operandValue(ctx, instruction.operand));
      break;
    }
    case 'NOT': {
      reg.setWithFlags(instruction.dr, ~reg.get(instruction.sr));
      break;
    }
    case 'BR': {
      const cond = reg.cond;
      const taken =
        (instruction.n && cond === ConditionFlag.FL_NEG) ||
        (instruction.z && cond === ConditionFlag.FL_ZRO) ||
        (instruction.p && cond === ConditionFlag.FL_POS);
      if (taken) {
        reg.pc += instruction.pcOffset;
      }
      break;
    }
    case 'JMP': {
      reg.pc = reg.get(instruction.baseR);
      break;
    }
    case 'JSR': {
      reg.set(Register.R_R7, reg.pc);
      reg.pc += instruction.pcOffset;
      break;
    }
    case 'JSRR': {
      /* read the base before R7 is overwritten: JSRR R7 jumps to the old R7 */
      const target = reg.get(instruction.baseR);
      reg.set(Register.R_R7, reg.pc);
      reg.pc = target;
      break;
    }
    case 'LD': {
      reg.setWithFlags(instruction.dr, memory.read(reg.pc + instruction.pcOffset));
      break;
    }
    case 'LDI': {
      /* add pc_offset to the current PC, look at that memory location to get the final address */
      reg.setWithFlags(instruction.dr, memory.read(memory.read(reg.pc + instruction.pcOffset)));
      break;
    }
    case 'LDR': {
      reg.setWithFlags(instruction.dr, memory.read(reg.get(instruction.baseR) + instruction.offset));
      break;
    }
    case 'LEA': {
      reg.setWithFlags(instruction.dr, reg.pc + instruction.pcOffset);
      break;
    }
    case 'ST': {
      memory.write(reg.pc + instruction.pcOffset, reg.get(instruction.sr));
      break;
    }
    case 'STI': {
      memory.write(memory.read(reg.pc + instruction.pcOffset), reg.get(instruction.sr));
      break;
    }
    case 'STR': {
      memory.write(reg.get(instruction.baseR) + instruction.offset, reg.get(instruction.sr));
      break;
    }
    case 'TRAP': {
      /* an unknown vector must leave R7 untouched */
      if (!isTrap(instruction.vector)) {
        throw new UnimplementedTrapError(instruction.vector, address);
      }
      reg.set(Register.R_R7, reg.pc);
      return handleTrap(instruction.vector, ctx, address);
    }
    default: {
      const unreachable: never = instruction;
      return unreachable;
    }
  }
  return 'continue';
}
