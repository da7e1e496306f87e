const SIGN_BIT = 1 << 15;

/**
 * Extends the low `bitCount` bits of `x` to a signed number, replicating the
 * field's sign bit into every higher bit.
 */
export function signExtend(x: number, bitCount: number): number {
  const m = 1 << (bitCount - 1);
  x &= (1 << bitCount) - 1;
  return (x ^ m) - m;
}

/** Reads a 16-bit word as two's complement. */
export function toSigned(word: number): number {
  word &= 0xffff;
  return word & SIGN_BIT ? word - 0x10000 : word;
}

export function bits(instr: number, high: number, low: number): number {
  return (instr >> low) & ((1 << (high - low + 1)) - 1);
}

export function hex(word: number, digits = 4): string {
  return 'x' + word.toString(16).toUpperCase().padStart(digits, '0');
}
