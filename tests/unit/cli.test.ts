import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../../src/cli';
import { image } from '../helpers';

describe('cli', () => {
  let dir: string;

  function objFile(bytes: Uint8Array): string {
    const path = join(dir, 'program.obj');
    writeFileSync(path, bytes);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lc3-vm-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('requires exactly one image path', () => {
    expect(main([])).toBe(2);
    expect(main(['a.obj', 'b.obj'])).toBe(2);
  });

  it('rejects a bad --max-steps', () => {
    expect(main(['a.obj', '--max-steps', 'lots'])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("--max-steps must be a positive integer, got 'lots'");
  });

  it('rejects unknown flags', () => {
    expect(main(['a.obj', '--fast'])).toBe(2);
  });

  it('reports a missing file', () => {
    expect(main([join(dir, 'missing.obj')])).toBe(1);
  });

  it('reports a malformed image', () => {
    const path = objFile(Uint8Array.from([0x30, 0x00, 0x12]));
    expect(main([path])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      `Cannot load '${path}': Object image must hold whole 16-bit words, but is 3 bytes long`
    );
  });

  it('lists the image with --disassemble', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const path = objFile(image(0x3000, [0b1110_000_000000010, 0xf022, 0xf025]));
    expect(main([path, '--disassemble'])).toBe(0);
    expect(log.mock.calls).toEqual([['x3000: LEA R0, x3003'], ['x3001: PUTS'], ['x3002: HALT']]);
  });

  it('runs to HALT with scripted input', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const path = objFile(image(0x3000, [0xf020, 0xf021, 0xf025]));
    expect(main([path, '--input', 'z'])).toBe(0);
    expect(write).toHaveBeenCalledWith(Buffer.from([0x7a]));
    expect(console.error).toHaveBeenCalledWith('HALT');
  });

  it('fails on an unimplemented operation', () => {
    const path = objFile(image(0x3000, [0xd000]));
    expect(main([path, '--input', ''])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Unimplemented opcode 1101 (instruction xD000) at x3000');
  });

  it('fails when the step limit is reached', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const path = objFile(image(0x3000, [0x0fff]));
    expect(main([path, '--input', '', '--max-steps', '5'])).toBe(1);
    expect(warn).toHaveBeenCalledWith('Stopped after 5 instructions at x3000');
  });
});
