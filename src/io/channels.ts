/** Blocking byte source used by GETC and IN. */
export interface InputChannel {
  /** Blocks until a character is available; null once the input has ended. */
  read(): number | null;
}

export interface OutputChannel {
  write(bytes: readonly number[]): void;
}

export class ScriptedInput implements InputChannel {
  private readonly bytes: number[];
  private pos = 0;

  constructor(input: string | readonly number[]) {
    this.bytes =
      typeof input === 'string'
        ? Array.from(Buffer.from(input, 'latin1'))
        : input.map((b) => b & 0xff);
  }

  public read(): number | null {
    if (this.pos >= this.bytes.length) return null;
    return this.bytes[this.pos++];
  }

  public get remaining(): number {
    return this.bytes.length - this.pos;
  }
}

export class CapturedOutput implements OutputChannel {
  public readonly bytes: number[] = [];

  public write(bytes: readonly number[]): void {
    this.bytes.push(...bytes);
  }

  public text(): string {
    return Buffer.from(this.bytes).toString('latin1');
  }
}
