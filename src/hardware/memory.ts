import { MEMORY_SIZE } from '../constants/memory';

/**
 * 65536 words of 16 bits. Every address is valid: it is reduced to 16 bits
 * before use, so reads and writes wrap around the top of memory.
 */
export class Memory {
  private readonly cells = new Uint16Array(MEMORY_SIZE);

  public read(address: number): number {
    return this.cells[address & 0xffff];
  }

  public write(address: number, value: number): void {
    this.cells[address & 0xffff] = value;
  }

  /** Copies `words` into consecutive cells starting at `origin`. */
  public writeBlock(origin: number, words: ArrayLike<number>): void {
    for (let i = 0; i < words.length; i++) {
      this.write(origin + i, words[i]);
    }
  }
}
