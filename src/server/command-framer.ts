import { MAX_COMMAND_BYTES } from '../shared/constants.js';

export interface CommandFrame {
  /** Decoded and trimmed command text; empty means end of session */
  text: string;
  /** Whether the sender ended the command with a line terminator */
  terminated: boolean;
}

const NEWLINE = 0x0a;

/**
 * Splits an incoming byte stream into commands.
 *
 * A command ends at a newline, or is cut at maxBytes when no newline comes
 * in time. The cut moves back to the start of a UTF-8 sequence it would
 * otherwise split. Bytes without a terminator stay buffered until flush() is called,
 * which lets senders that write a bare token be served after a quiet period.
 */
export class CommandFramer {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxBytes = MAX_COMMAND_BYTES) {}

  push(chunk: Buffer): CommandFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: CommandFrame[] = [];
    for (;;) {
      const newline = this.buffer.indexOf(NEWLINE);
      if (newline !== -1 && newline <= this.maxBytes) {
        frames.push({ text: decode(this.buffer.subarray(0, newline)), terminated: true });
        this.buffer = this.buffer.subarray(newline + 1);
        continue;
      }
      if (this.buffer.length > this.maxBytes) {
        const cut = this.characterBoundary();
        frames.push({ text: decode(this.buffer.subarray(0, cut)), terminated: false });
        this.buffer = this.buffer.subarray(cut);
        continue;
      }
      break;
    }
    return frames;
  }

  /**
   * Take whatever is buffered as one unterminated command
   */
  flush(): CommandFrame | null {
    if (this.buffer.length === 0) {
      return null;
    }
    const frame = { text: decode(this.buffer), terminated: false };
    this.buffer = Buffer.alloc(0);
    return frame;
  }

  // Continuation bytes look like 10xxxxxx; a UTF-8 sequence is at most 4 bytes
  private characterBoundary(): number {
    let cut = this.maxBytes;
    while (cut > this.maxBytes - 3 && cut > 0 && isContinuationByte(this.buffer[cut])) {
      cut--;
    }
    return cut > 0 && !isContinuationByte(this.buffer[cut]) ? cut : this.maxBytes;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function decode(bytes: Buffer): string {
  return bytes.toString('utf8').trim();
}
