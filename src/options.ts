export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface VmOptions {
  /** Initial PC; null starts at the origin of the first loaded image. */
  pcStart: number | null;
  /** Written by the IN trap before it reads a character. */
  inPrompt: string;
  /** Stop with a `step-limit` result after this many instructions. */
  maxSteps: number | null;
  /** Log every executed instruction at debug level. */
  trace: boolean;
  logger: Logger;
}

export const DEFAULT_VM_OPTIONS: VmOptions = {
  pcStart: null,
  inPrompt: 'Enter a character: ',
  maxSteps: null,
  trace: false,
  logger: console,
};
