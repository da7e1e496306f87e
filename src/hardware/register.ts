export enum Register {
  R_R0,
  R_R1,
  R_R2,
  R_R3,
  R_R4,
  R_R5,
  R_R6,
  R_R7,
  R_PC /* program counter */,
  R_COND,
  R_COUNT,
}

export enum ConditionFlag {
  FL_POS = 1 << 0 /* P */,
  FL_ZRO = 1 << 1 /* Z */,
  FL_NEG = 1 << 2 /* N */,
}

const SIGN_BIT = 1 << 15;

function generalRegister(r: number): number {
  if (!Number.isInteger(r) || r < Register.R_R0 || r > Register.R_R7) {
    throw new RangeError(`Not a general purpose register: ${r}`);
  }
  return r;
}

/**
 * R0-R7, the program counter and the condition codes, stored as 16-bit
 * words. Exactly one condition flag is set at any time; a fresh register file
 * starts with Z.
 */
export class RegisterFile {
  private readonly registers = new Uint16Array(Register.R_COUNT);

  constructor() {
    this.registers[Register.R_COND] = ConditionFlag.FL_ZRO;
  }

  /** Reads R0-R7; the PC and condition codes have their own accessors. */
  public get(r: number): number {
    return this.registers[generalRegister(r)];
  }

  public set(r: number, value: number): void {
    this.registers[generalRegister(r)] = value;
  }

  public get pc(): number {
    return this.registers[Register.R_PC];
  }

  public set pc(value: number) {
    this.registers[Register.R_PC] = value;
  }

  public get cond(): ConditionFlag {
    const cond = this.registers[Register.R_COND];
    if (cond === ConditionFlag.FL_NEG) return ConditionFlag.FL_NEG;
    if (cond === ConditionFlag.FL_POS) return ConditionFlag.FL_POS;
    return ConditionFlag.FL_ZRO;
  }

  /** Sets N, Z or P from the sign of a 16-bit result. */
  public setFlags(result: number): void {
    result &= 0xffff;
    if (result === 0) {
      this.registers[Register.R_COND] = ConditionFlag.FL_ZRO;
    } else if (result & SIGN_BIT) {
      /* a 1 in the left-most bit indicates negative */
      this.registers[Register.R_COND] = ConditionFlag.FL_NEG;
    } else {
      this.registers[Register.R_COND] = ConditionFlag.FL_POS;
    }
  }

  /** Writes a general register and updates the flags from it. */
  public setWithFlags(r: number, value: number): void {
    this.set(r, value);
    this.setFlags(this.get(r));
  }

  public snapshot(): number[] {
    return Array.from(this.registers.subarray(Register.R_R0, Register.R_PC));
  }
}
