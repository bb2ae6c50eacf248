import { startSpinner, type SpinnerStream } from '../src/lib/spinner';

/** Stand-in for a terminal stream that records writes */
function createStream(isTTY: boolean) {
  const writes: string[] = [];
  const stream: SpinnerStream = {
    isTTY,
    write: (chunk: string) => {
      writes.push(chunk);
      return true;
    },
  };
  return { stream, writes };
}

describe('startSpinner', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('animates the message with progress counts', () => {
    const { stream, writes } = createStream(true);

    const spinner = startSpinner('Setting featured images…', { stream });
    spinner.tick(3, 10);
    jest.advanceTimersByTime(80);
    spinner.stop();

    expect(writes[0]).toBe('\x1b[?25l');
    expect(writes[1]).toBe('\r\x1b[K\x1b[36m⠋\x1b[0m Setting featured images… (3/10)');
    expect(writes[2]).toBe('\r\x1b[K\x1b[?25h');
  });

  it('writes a final status line on succeed and fail', () => {
    const ok = createStream(true);
    startSpinner('Working…', { stream: ok.stream }).succeed('Done');
    expect(ok.writes.slice(-1)).toEqual(['\r\x1b[K\x1b[32m✔\x1b[0m Done\n']);

    const bad = createStream(true);
    startSpinner('Working…', { stream: bad.stream }).fail('Failed');
    expect(bad.writes.slice(-1)).toEqual(['\r\x1b[K\x1b[31m✖\x1b[0m Failed\n']);
  });

  it('stops writing once stopped', () => {
    const { stream, writes } = createStream(true);

    const spinner = startSpinner('Working…', { stream });
    spinner.stop();
    spinner.stop();
    jest.advanceTimersByTime(500);

    expect(writes).toEqual(['\x1b[?25l', '\r\x1b[K\x1b[?25h']);
  });

  it('does nothing outside a terminal', () => {
    const { stream, writes } = createStream(false);

    const spinner = startSpinner('Working…', { stream });
    spinner.tick(1, 2);
    jest.advanceTimersByTime(500);
    spinner.succeed('Done');

    expect(writes).toEqual([]);
  });

  it('clears itself and re-raises SIGINT so the process still stops', () => {
    const { stream, writes } = createStream(true);
    const kill = jest.spyOn(process, 'kill').mockImplementation(() => true);
    const before = process.listeners('SIGINT');

    startSpinner('Working…', { stream });
    const added = process.listeners('SIGINT').filter(listener => !before.includes(listener));
    expect(added).toHaveLength(1);

    added[0]('SIGINT');

    expect(writes).toEqual(['\x1b[?25l', '\r\x1b[K\x1b[?25h']);
    expect(process.listeners('SIGINT')).toEqual(before);
    expect(kill).toHaveBeenCalledWith(process.pid, 'SIGINT');
    kill.mockRestore();
  });
});
