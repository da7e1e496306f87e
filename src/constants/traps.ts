export enum Trap {
  TRAP_GETC = 0x20 /* get character from keyboard, not echoed onto the terminal */,
  TRAP_OUT = 0x21 /* output a character */,
  TRAP_PUTS = 0x22 /* output a word string */,
  TRAP_IN = 0x23 /* get character from keyboard, echoed onto the terminal */,
  TRAP_PUTSP = 0x24 /* output a byte string */,
  TRAP_HALT = 0x25 /* halt the program */,
}

export const TRAP_NAMES: Readonly<Record<Trap, string>> = {
  [Trap.TRAP_GETC]: 'GETC',
  [Trap.TRAP_OUT]: 'OUT',
  [Trap.TRAP_PUTS]: 'PUTS',
  [Trap.TRAP_IN]: 'IN',
  [Trap.TRAP_PUTSP]: 'PUTSP',
  [Trap.TRAP_HALT]: 'HALT',
};

export function isTrap(vector: number): vector is Trap {
  return vector >= Trap.TRAP_GETC && vector <= Trap.TRAP_HALT;
}
