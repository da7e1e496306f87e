import { OpCode } from '../constants/opcodes';
import { UnimplementedOpcodeError } from '../errors';
import { bits, signExtend } from '../utils/bits';
import type { Instruction, Operand } from './instruction';

const dr = (instr: number): number => bits(instr, 11, 9);
const sr1 = (instr: number): number => bits(instr, 8, 6);
const pcOffset9 = (instr: number): number => signExtend(instr, 9);
const offset6 = (instr: number): number => signExtend(instr, 6);

function operand(instr: number): Operand {
  /* bit 5 selects immediate mode */
  if ((instr >> 5) & 0x1) {
    return { mode: 'immediate', imm: signExtend(instr, 5) };
  }
  return { mode: 'register', sr2: instr & 0x7 };
}

/**
 * Decodes one instruction word. RTI and the reserved opcode have no
 * instruction here and raise {@link UnimplementedOpcodeError}; `address` is
 * only used to report where the word was fetched from.
 */
export function decode(instr: number, address: number): Instruction {
  instr &= 0xffff;
  const op: number = instr >> 12;

  switch (op) {
    case OpCode.OP_ADD:
      return { op: 'ADD', dr: dr(instr), sr1: sr1(instr), operand: operand(instr) };
    case OpCode.OP_AND:
      return { op: 'AND', dr: dr(instr), sr1: sr1(instr), operand: operand(instr) };
    case OpCode.OP_NOT:
      return { op: 'NOT', dr: dr(instr), sr: sr1(instr) };
    case OpCode.OP_BR:
      return {
        op: 'BR',
        n: ((instr >> 11) & 1) === 1,
        z: ((instr >> 10) & 1) === 1,
        p: ((instr >> 9) & 1) === 1,
        pcOffset: pcOffset9(instr),
      };
    case OpCode.OP_JMP:
      /* Also handles RET */
      return { op: 'JMP', baseR: sr1(instr) };
    case OpCode.OP_JSR:
      if ((instr >> 11) & 1) {
        return { op: 'JSR', pcOffset: signExtend(instr, 11) };
      }
      return { op: 'JSRR', baseR: sr1(instr) };
    case OpCode.OP_LD:
      return { op: 'LD', dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_LDI:
      return { op: 'LDI', dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_LDR:
      return { op: 'LDR', dr: dr(instr), baseR: sr1(instr), offset: offset6(instr) };
    case OpCode.OP_LEA:
      return { op: 'LEA', dr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_ST:
      return { op: 'ST', sr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_STI:
      return { op: 'STI', sr: dr(instr), pcOffset: pcOffset9(instr) };
    case OpCode.OP_STR:
      return { op: 'STR', sr: dr(instr), baseR: sr1(instr), offset: offset6(instr) };
    case OpCode.OP_TRAP:
      return { op: 'TRAP', vector: instr & 0xff };
    case OpCode.OP_RES:
    case OpCode.OP_RTI:
    default:
      throw new UnimplementedOpcodeError(op, instr, address);
  }
}
