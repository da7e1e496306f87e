import { isTrap, TRAP_NAMES } from './constants/traps';
import { decode } from './cpu/decoder';
import type { Instruction, Operand } from './cpu/instruction';
import { isUnimplementedOperation } from './errors';
import { hex } from './utils/bits';

const reg = (r: number): string => `R${r}`;

function operand(o: Operand): string {
  return o.mode === 'immediate' ? `#${o.imm}` : reg(o.sr2);
}

/** Target of a PC-relative operand for an instruction fetched from `address`. */
function target(address: number, offset: number): string {
  return hex((address + 1 + offset) & 0xffff);
}

export function formatInstruction(i: Instruction, address: number): string {
  switch (i.op) {
    case 'ADD':
    case 'AND':
      return `${i.op} ${reg(i.dr)}, ${reg(i.sr1)}, ${operand(i.operand)}`;
    case 'NOT':
      return `NOT ${reg(i.dr)}, ${reg(i.sr)}`;
    case 'BR': {
      if (!i.n && !i.z && !i.p) return 'NOP';
      const cc = `${i.n ? 'n' : ''}${i.z ? 'z' : ''}${i.p ? 'p' : ''}`;
      return `BR${cc === 'nzp' ? '' : cc} ${target(address, i.pcOffset)}`;
    }
    case 'JMP':
      return i.baseR === 7 ? 'RET' : `JMP ${reg(i.baseR)}`;
    case 'JSR':
      return `JSR ${target(address, i.pcOffset)}`;
    case 'JSRR':
      return `JSRR ${reg(i.baseR)}`;
    case 'LD':
    case 'LDI':
    case 'LEA':
      return `${i.op} ${reg(i.dr)}, ${target(address, i.pcOffset)}`;
    case 'ST':
    case 'STI':
      return `${i.op} ${reg(i.sr)}, ${target(address, i.pcOffset)}`;
    case 'LDR':
      return `LDR ${reg(i.dr)}, ${reg(i.baseR)}, #${i.offset}`;
    case 'STR':
      return `STR ${reg(i.sr)}, ${reg(i.baseR)}, #${i.offset}`;
    case 'TRAP':
      return isTrap(i.vector) ? TRAP_NAMES[i.vector] : `TRAP ${hex(i.vector, 2)}`;
  }
}

/** Renders one word as assembly; words without an instruction come out as `.FILL`. */
export function disassemble(word: number, address: number): string {
  try {
    return formatInstruction(decode(word, address), address);
  } catch (e) {
    if (isUnimplementedOperation(e)) {
      return `.FILL ${hex(word & 0xffff)}`;
    }
    throw e;
  }
}

/** One `xADDR: text` line per word, starting at `origin`. */
export function disassembleBlock(origin: number, words: ArrayLike<number>): string[] {
  const lines: string[] = [];
  for (let i = 0; i < words.length; i++) {
    const address = (origin + i) & 0xffff;
    lines.push(`${hex(address)}: ${disassemble(words[i], address)}`);
  }
  return lines;
}
