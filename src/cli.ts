#!/usr/bin/env node
import { readFileSync } from 'fs';
import { parseArgs } from 'util';
import { disassembleBlock } from './disassembler';
import { LoadError } from './errors';
import { ScriptedInput, type InputChannel } from './io/channels';
import { StdoutOutput, TerminalInput } from './io/terminal';
import { LC3VirtualMachine } from './lc3-vm';
import { parseImage } from './loader/image';
import type { Logger } from './options';
import { hex } from './utils/bits';

const USAGE =
  'Usage: lc3-vm <image.obj> [--input <text>] [--trace] [--max-steps <n>] [--disassemble] [--quit-key <c>]';

/** Diagnostics go to stderr so they never mix with program output. */
const logger: Logger = {
  debug: (message) => console.error(message),
  info: (message) => console.error(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      input: { type: 'string' },
      trace: { type: 'boolean', default: false },
      'max-steps': { type: 'string' },
      disassemble: { type: 'boolean', default: false },
      'quit-key': { type: 'string' },
    },
  });
}

export function main(argv: string[]): number {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (e) {
    logger.error(e instanceof Error ? e.message : String(e));
    logger.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (positionals.length !== 1) {
    logger.error(USAGE);
    return 2;
  }

  let maxSteps: number | null = null;
  if (values['max-steps'] !== undefined) {
    maxSteps = Number(values['max-steps']);
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      logger.error(`--max-steps must be a positive integer, got '${values['max-steps']}'`);
      return 2;
    }
  }

  const imagePath = positionals[0];
  let bytes: Buffer;
  try {
    bytes = readFileSync(imagePath);
  } catch (e) {
    logger.error(`Cannot read '${imagePath}': ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  let vm: LC3VirtualMachine;
  try {
    const image = parseImage(bytes);
    if (values.disassemble) {
      for (const line of disassembleBlock(image.origin, image.words)) {
        console.log(line);
      }
      return 0;
    }
    vm = new LC3VirtualMachine({ maxSteps, trace: values.trace === true, logger });
    vm.loadImage(image);
  } catch (e) {
    if (e instanceof LoadError) {
      logger.error(`Cannot load '${imagePath}': ${e.message}`);
      return 1;
    }
    throw e;
  }

  const input: InputChannel =
    values.input !== undefined
      ? new ScriptedInput(values.input)
      : new TerminalInput({ quitKey: values['quit-key'] });
  const result = vm.run(input, new StdoutOutput());

  switch (result.status) {
    case 'halted':
      logger.info('HALT');
      return 0;
    case 'step-limit':
      logger.warn(`Stopped after ${result.steps} instructions at ${hex(vm.registers.pc)}`);
      return 1;
    case 'unimplemented':
      logger.error(result.error.message);
      logger.error(vm.registers.snapshot().map((v, r) => `R${r}=${hex(v)}`).join(' '));
      return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
