/**
 * Stream capture implementation
 * Swaps a command's output, error and input channels for in-memory buffers
 * for the duration of one scope. The real process streams are never reassigned.
 */

import { Readable } from 'stream';
import {
  CaptureScope,
  CapturedOutput,
  InputChannel,
  OutputChannel,
  StreamCapture,
} from '../core/interfaces.js';
import { Result, ok, err } from '../core/result.js';
import { HarnessError, captureAlreadyActive, captureNotActive } from '../core/errors.js';

export const DEFAULT_MAX_CAPTURE_BYTES = 1024 * 1024; // 1MB per channel

/**
 * Output channel backed by a size-limited string buffer
 * Output stops at the first write past the limit; that write and every later one are dropped
 */
export class BufferedOutputChannel implements OutputChannel {
  private readonly chunks: string[] = [];
  private totalSize = 0;
  private overflowed = false;

  constructor(private readonly maxBytes: number = DEFAULT_MAX_CAPTURE_BYTES) {}

  print(text: string): void {
    if (this.overflowed) {
      return;
    }
    const dataSize = Buffer.byteLength(text, 'utf8');
    if (this.totalSize + dataSize > this.maxBytes) {
      this.overflowed = true;
      return;
    }
    this.chunks.push(text);
    this.totalSize += dataSize;
  }

  println(text = ''): void {
    this.print(`${text}\n`);
  }

  contents(): string {
    return this.chunks.join('');
  }

  get truncated(): boolean {
    return this.overflowed;
  }
}

/**
 * Output channel writing straight to a real stream
 */
export class WritableOutputChannel implements OutputChannel {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  print(text: string): void {
    this.stream.write(text);
  }

  println(text = ''): void {
    this.stream.write(`${text}\n`);
  }
}

/**
 * Input channel over answers staged before the command started
 */
export class StagedInputChannel implements InputChannel {
  readonly text: string;
  private readonly pending: string[];

  constructor(lines: readonly string[]) {
    this.text = lines.map(line => `${line}\n`).join('');
    this.pending = [...lines];
  }

  readLine(): string | null {
    return this.pending.shift() ?? null;
  }

  asStream(): Readable {
    const remaining = this.pending.map(line => `${line}\n`).join('');
    return Readable.from([Buffer.from(remaining, 'utf8')], { objectMode: false });
  }
}

interface ActiveScope extends CaptureScope {
  readonly out: BufferedOutputChannel;
  readonly err: BufferedOutputChannel;
}

/**
 * Channels bound to the real process streams, used when no scope is open
 */
export const processScope = (): CaptureScope => ({
  out: new WritableOutputChannel(process.stdout),
  err: new WritableOutputChannel(process.stderr),
  input: new StagedInputChannel([]),
});

export class BufferedStreamCapture implements StreamCapture {
  private active: ActiveScope | null = null;

  constructor(
    private readonly maxBytes: number = DEFAULT_MAX_CAPTURE_BYTES,
    private readonly passthrough: CaptureScope = processScope()
  ) {}

  begin(input: readonly string[]): Result<CaptureScope, HarnessError> {
    if (this.active) {
      return err(captureAlreadyActive());
    }

    this.active = {
      out: new BufferedOutputChannel(this.maxBytes),
      err: new BufferedOutputChannel(this.maxBytes),
      input: new StagedInputChannel(input),
    };
    return ok(this.active);
  }

  end(): Result<CapturedOutput, HarnessError> {
    const scope = this.active;
    if (!scope) {
      return err(captureNotActive());
    }

    // Dropping the scope restores the passthrough channels and frees the buffers
    this.active = null;

    return ok({
      stdout: scope.out.contents(),
      stderr: scope.err.contents(),
      truncated: scope.out.truncated || scope.err.truncated,
    });
  }

  isActive(): boolean {
    return this.active !== null;
  }

  current(): CaptureScope {
    return this.active ?? this.passthrough;
  }
}
