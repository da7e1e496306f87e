import { keyIn, keyInYN } from 'readline-sync';
import type { InputChannel, OutputChannel } from './channels';

export interface TerminalInputOptions {
  /** Key that asks whether to end input instead of being passed to the program. */
  quitKey?: string;
}

/**
 * Reads single keys from the terminal with readline-sync. Keys are never
 * echoed here; IN echoes through the output channel. Once the user confirms
 * the quit key the channel reports end of input for good.
 */
export class TerminalInput implements InputChannel {
  private closed = false;

  constructor(private readonly options: TerminalInputOptions = {}) {}

  public read(): number | null {
    if (this.closed) return null;

    const input = keyIn('', { hideEchoBack: true, mask: '' });
    if (input === '') {
      this.closed = true;
      return null;
    }
    if (this.options.quitKey !== undefined && input === this.options.quitKey) {
      if (keyInYN('Would you like to quit?') === true) {
        this.closed = true;
        return null;
      }
    }
    return input.charCodeAt(0) & 0xff;
  }
}

export class StdoutOutput implements OutputChannel {
  public write(bytes: readonly number[]): void {
    process.stdout.write(Buffer.from(bytes));
  }
}
