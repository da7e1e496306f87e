import { describe, it, expect, vi } from 'vitest';
import { Keyboard, ScriptedKeyboard } from '../../src/hardware/keyboard';
import { Memory } from '../../src/hardware/memory';

describe('ScriptedKeyboard', () => {
  it('returns keys after the configured number of empty polls', () => {
    const keys = new ScriptedKeyboard('xy', 1);
    expect(keys.poll()).toBeNull();
    expect(keys.poll()).toBe(0x78);
    expect(keys.poll()).toBeNull();
    expect(keys.poll()).toBe(0x79);
    expect(keys.poll()).toBeNull();
    expect(keys.poll()).toBeNull();
  });
});

describe('Keyboard', () => {
  it('latches a key into KBSR and KBDR', () => {
    const memory = new Memory();
    const keyboard = new Keyboard(memory, new ScriptedKeyboard('q'));
    expect(keyboard.ready).toBe(false);
    keyboard.update();
    expect(keyboard.ready).toBe(true);
    expect(memory.read(0xfe00)).toBe(0x8000);
    expect(memory.read(0xfe02)).toBe(0x71);
  });

  it('does not poll while a key is waiting', () => {
    const memory = new Memory();
    const source = { poll: vi.fn(() => 0x61) };
    const keyboard = new Keyboard(memory, source);
    keyboard.update();
    keyboard.update();
    expect(source.poll).toHaveBeenCalledTimes(1);

    memory.write(0xfe00, 0);
    keyboard.update();
    expect(source.poll).toHaveBeenCalledTimes(2);
  });

  it('leaves the registers alone when no key is pending', () => {
    const memory = new Memory();
    memory.write(0xfe02, 0x55);
    new Keyboard(memory, new ScriptedKeyboard('')).update();
    expect(memory.read(0xfe00)).toBe(0);
    expect(memory.read(0xfe02)).toBe(0x55);
  });
});
