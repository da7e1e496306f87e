import { describe, it, expect } from 'vitest';
import { load } from '../../src/lc3-vm';
import { CapturedOutput, ScriptedInput } from '../../src/io/channels';
import { ScriptedKeyboard } from '../../src/hardware/keyboard';
import { image, stringz } from '../helpers';

describe('programs', () => {
  it('prints a string with PUTS and halts', () => {
    const vm = load(
      image(0x3000, [
        0b1110_000_000000010, // LEA R0, MSG
        0xf022, // PUTS
        0xf025, // HALT
        ...stringz('OK'), // MSG
      ])
    );
    const output = new CapturedOutput();
    const result = vm.run(new ScriptedInput(''), output);
    expect(output.text()).toBe('OK');
    expect(result).toEqual({ status: 'halted', steps: 3 });
  });

  it('multiplies by repeated addition', () => {
    const vm = load(
      image(0x3000, [
        0b0010_000_000000110, // LD R0, FACTOR
        0b0010_011_000000111, // LD R3, ZERO
        0b0010_010_000000101, // LD R2, COUNT
        0b0001_011_011_0_00_000, // LOOP: ADD R3, R3, R0
        0b0001_010_010_1_11111, // ADD R2, R2, #-1
        0b0000_101_111111101, // BRnp LOOP
        0xf025, // HALT
        7, // FACTOR
        10, // COUNT
        0, // ZERO
      ])
    );
    const result = vm.run(new ScriptedInput(''), new CapturedOutput());
    expect(result).toEqual({ status: 'halted', steps: 34 });
    expect(vm.registers.get(3)).toBe(70);
    expect(vm.registers.get(2)).toBe(0);
  });

  it('echoes input until it runs out', () => {
    const vm = load(
      image(0x3000, [
        0xf020, // LOOP: GETC
        0b0001_000_000_1_00000, // ADD R0, R0, #0
        0b0000_010_000000010, // BRz DONE
        0xf021, // OUT
        0b0000_111_111111011, // BRnzp LOOP
        0xf025, // DONE: HALT
      ])
    );
    const output = new CapturedOutput();
    expect(vm.run(new ScriptedInput('hey'), output).status).toBe('halted');
    expect(output.text()).toBe('hey');
  });

  it('prompts and echoes with IN', () => {
    const vm = load(image(0x3000, [0xf023, 0xf021, 0xf025]), { inPrompt: '> ' });
    const output = new CapturedOutput();
    vm.run(new ScriptedInput('q'), output);
    expect(output.text()).toBe('> qq');
    expect(vm.registers.get(0)).toBe(0x71);
  });

  it('prints packed strings with PUTSP', () => {
    const vm = load(
      image(0x3000, [
        0b1110_000_000000010, // LEA R0, MSG
        0xf024, // PUTSP
        0xf025, // HALT
        0x694c, // "Li"
        0x656e, // "ne"
        0x000a, // "\n"
      ])
    );
    const output = new CapturedOutput();
    vm.run(new ScriptedInput(''), output);
    expect(output.text()).toBe('Line\n');
  });

  it('follows pointers with LDI and STI', () => {
    const vm = load(
      image(0x3000, [
        0b1010_001_000000011, // LDI R1, PTR
        0b0001_001_001_1_00001, // ADD R1, R1, #1
        0b1011_001_000000001, // STI R1, PTR
        0xf025, // HALT
        0x4000, // PTR
      ])
    );
    vm.memory.write(0x4000, 41);
    vm.run(new ScriptedInput(''), new CapturedOutput());
    expect(vm.memory.read(0x4000)).toBe(42);
    expect(vm.memory.read(0x3004)).toBe(0x4000);
  });

  it('polls the memory mapped keyboard', () => {
    const vm = load(
      image(0x3000, [
        0b1010_001_000000011, // START: LDI R1, KBSR
        0b0000_011_111111110, // BRzp START
        0b1010_000_000000010, // LDI R0, KBDR
        0xf025, // HALT
        0xfe00, // KBSR
        0xfe02, // KBDR
      ])
    );
    const result = vm.run(new ScriptedInput(''), new CapturedOutput(), new ScriptedKeyboard('x', 3));
    expect(result).toEqual({ status: 'halted', steps: 8 });
    expect(vm.registers.get(0)).toBe(0x78);
    expect(vm.registers.get(1)).toBe(0x8000);
  });
});
