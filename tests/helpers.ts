import { Memory } from '../src/hardware/memory';
import { RegisterFile } from '../src/hardware/register';
import { CapturedOutput, ScriptedInput } from '../src/io/channels';
import type { TrapContext } from '../src/cpu/traps';

/** Builds object image bytes: big-endian origin followed by the words. */
export function image(origin: number, words: number[]): Uint8Array {
  const bytes = new Uint8Array((words.length + 1) * 2);
  [origin, ...words].forEach((w, i) => {
    bytes[i * 2] = (w >> 8) & 0xff;
    bytes[i * 2 + 1] = w & 0xff;
  });
  return bytes;
}

/** Null-terminated string, one character per word. */
export function stringz(text: string): number[] {
  return [...Array.from(text, (c) => c.charCodeAt(0)), 0];
}

export function makeContext(input = '', inPrompt = ''): TrapContext & { output: CapturedOutput } {
  return {
    memory: new Memory(),
    registers: new RegisterFile(),
    input: new ScriptedInput(input),
    output: new CapturedOutput(),
    inPrompt,
  };
}
