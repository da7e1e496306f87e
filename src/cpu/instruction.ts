/** Second operand of ADD and AND: a register or a sign-extended imm5. */
export type Operand = { mode: 'register'; sr2: number } | { mode: 'immediate'; imm: number };

/**
 * One decoded instruction word. Register fields are indices 0-7; `pcOffset`,
 * `offset` and `imm` are already sign extended.
 */
export type Instruction =
  | { op: 'ADD'; dr: number; sr1: number; operand: Operand }
  | { op: 'AND'; dr: number; sr1: number; operand: Operand }
  | { op: 'NOT'; dr: number; sr: number }
  | { op: 'BR'; n: boolean; z: boolean; p: boolean; pcOffset: number }
  | { op: 'JMP'; baseR: number }
  | { op: 'JSR'; pcOffset: number }
  | { op: 'JSRR'; baseR: number }
  | { op: 'LD'; dr: number; pcOffset: number }
  | { op: 'LDI'; dr: number; pcOffset: number }
  | { op: 'LDR'; dr: number; baseR: number; offset: number }
  | { op: 'LEA'; dr: number; pcOffset: number }
  | { op: 'ST'; sr: number; pcOffset: number }
  | { op: 'STI'; sr: number; pcOffset: number }
  | { op: 'STR'; sr: number; baseR: number; offset: number }
  | { op: 'TRAP'; vector: number };

export type Mnemonic = Instruction['op'];
