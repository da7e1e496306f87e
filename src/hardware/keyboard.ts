import { KEY_READY, MemoryMappedRegister } from '../constants/memory';
import { Memory } from './memory';

/** Non-blocking key source behind the memory mapped keyboard registers. */
export interface KeyboardSource {
  /** Returns the next pending character code, or null when none is waiting. */
  poll(): number | null;
}

/**
 * Latches keys from a {@link KeyboardSource} into KBSR/KBDR. A new key is
 * only taken while the ready bit is clear; the program acknowledges a key by
 * clearing KBSR itself.
 */
export class Keyboard {
  constructor(
    private readonly memory: Memory,
    private readonly source: KeyboardSource
  ) {}

  public get ready(): boolean {
    return (this.memory.read(MemoryMappedRegister.MR_KBSR) & KEY_READY) !== 0;
  }

  public update(): void {
    if (this.ready) return;
    const key = this.source.poll();
    if (key !== null) {
      this.memory.write(MemoryMappedRegister.MR_KBSR, KEY_READY);
      this.memory.write(MemoryMappedRegister.MR_KBDR, key & 0xff);
    }
  }
}

/** Hands out the characters of a string, one per poll, after `delay` empty polls each. */
export class ScriptedKeyboard implements KeyboardSource {
  private index = 0;
  private waited = 0;

  constructor(
    private readonly keys: string,
    private readonly delay = 0
  ) {}

  public poll(): number | null {
    if (this.index >= this.keys.length) return null;
    if (this.waited < this.delay) {
      this.waited++;
      return null;
    }
    this.waited = 0;
    return this.keys.charCodeAt(this.index++);
  }
}
