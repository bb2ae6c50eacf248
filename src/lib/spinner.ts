/**
 * Lightweight CLI spinner for progress indication.
 * Zero dependencies — uses ANSI escape codes directly and writes to stderr,
 * so command output on stdout stays clean for piping.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL_MS = 80;

export interface Spinner {
  /** Show "message (done/total)" */
  tick(done: number, total: number): void;
  /** Stop and clear the spinner line */
  stop(): void;
  /** Stop and replace with a final message */
  succeed(message: string): void;
  /** Stop and replace with an error message */
  fail(message: string): void;
}

export interface SpinnerStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface SpinnerOptions {
  /** Defaults to process.stderr */
  stream?: SpinnerStream;
  /** Defaults to whether the stream is a TTY */
  enabled?: boolean;
}

const noopSpinner: Spinner = {
  tick() {},
  stop() {},
  succeed() {},
  fail() {},
};

/**
 * Start an animated spinner with the given message. Outside a terminal the
 * returned spinner does nothing.
 *
 * ```ts
 * const spin = startSpinner('Processing posts…');
 * await command.set({ onProgress: (done, total) => spin.tick(done, total) });
 * spin.stop();
 * ```
 */
export function startSpinner(message: string, options: SpinnerOptions = {}): Spinner {
  const stream: SpinnerStream = options.stream ?? process.stderr;
  if (!(options.enabled ?? stream.isTTY === true)) {
    return noopSpinner;
  }

  let frameIndex = 0;
  const baseMessage = message;
  let currentMessage = message;
  let stopped = false;

  // Hide cursor
  stream.write('\x1b[?25l');

  const timer = setInterval(() => {
    const frame = FRAMES[frameIndex % FRAMES.length];
    // \r moves to start of line, \x1b[K clears to end of line
    stream.write(`\r\x1b[K\x1b[36m${frame}\x1b[0m ${currentMessage}`);
    frameIndex++;
  }, INTERVAL_MS);

  // Restore the cursor if the process exits mid-spin
  const cleanup = () => {
    clear();
  };
  // A SIGINT listener replaces Node's default exit; re-raise once ours is removed
  const interrupt = () => {
    clear();
    process.kill(process.pid, 'SIGINT');
  };
  process.on('exit', cleanup);
  process.on('SIGINT', interrupt);

  function clear(): void {
    if (stopped) return;
    stopped = true;
    clearInterval(timer);
    stream.write('\r\x1b[K\x1b[?25h');
    process.removeListener('exit', cleanup);
    process.removeListener('SIGINT', interrupt);
  }

  return {
    tick(done: number, total: number) {
      currentMessage = `${baseMessage} (${done}/${total})`;
    },
    stop() {
      clear();
    },
    succeed(msg: string) {
      clear();
      stream.write(`\r\x1b[K\x1b[32m✔\x1b[0m ${msg}\n`);
    },
    fail(msg: string) {
      clear();
      stream.write(`\r\x1b[K\x1b[31m✖\x1b[0m ${msg}\n`);
    },
  };
}
