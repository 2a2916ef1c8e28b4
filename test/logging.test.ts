import { expect } from 'chai';
import sinon from 'sinon';

import {
  configureLogging,
  defaultLogFileName,
  log,
  LogLevel,
  logThrottled,
  measurePerformance,
  parseLogLevel
} from '../src/logging';
import { rejectionOf } from './support/fixtures';

function memorySink() {
  const lines: string[] = [];
  return { lines, appendLine: (line: string) => lines.push(line) };
}

describe('logging', () => {
  let sink: ReturnType<typeof memorySink>;

  beforeEach(() => {
    sink = memorySink();
    configureLogging(LogLevel.INFO, sink);
  });

  afterEach(() => {
    configureLogging(LogLevel.INFO, undefined);
    sinon.restore();
  });

  it('formats lines with a padded level', () => {
    log('hello', LogLevel.WARN);

    expect(sink.lines).to.have.length(1);
    expect(sink.lines[0]).to.match(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}\] \[WARN \] hello$/);
  });

  it('filters below the configured level unless forced', () => {
    log('quiet', LogLevel.DEBUG);
    log('loud', LogLevel.DEBUG, true);

    expect(sink.lines).to.have.length(1);
    expect(sink.lines[0]).to.match(/\[DEBUG\] loud$/);
  });

  it('appends elapsed time to info lines', () => {
    log('listed pods', LogLevel.INFO, false, 42);

    expect(sink.lines[0]).to.match(/listed pods \(took 42ms\)$/);
  });

  it('drops everything without a sink', () => {
    configureLogging(LogLevel.DEBUG, undefined);
    log('nowhere', LogLevel.ERROR);

    expect(sink.lines).to.deep.equal([]);
  });

  it('disposes the previous sink when reconfigured', () => {
    const dispose = sinon.spy();
    configureLogging(LogLevel.INFO, { appendLine: () => undefined, dispose });

    configureLogging(LogLevel.INFO, sink);

    expect(dispose.calledOnce).to.equal(true);
  });

  it('throttles repeated messages per origin', () => {
    configureLogging(LogLevel.DEBUG, sink);
    const clock = sinon.useFakeTimers({ now: 100_000, toFake: ['Date'] });
    try {
      logThrottled('watch:test', 'first');
      logThrottled('watch:test', 'second');
      clock.tick(1001);
      logThrottled('watch:test', 'third');
    } finally {
      clock.restore();
    }

    expect(sink.lines.map(line => line.split('] ').pop())).to.deep.equal(['first', 'third']);
  });

  it('logs failures of measured operations and rethrows', async () => {
    const err = await rejectionOf(measurePerformance(() => Promise.reject(new Error('boom')), 'Loading pods'));

    expect(err).to.be.instanceOf(Error);
    expect(sink.lines[0]).to.match(/\[ERROR\] Loading pods - Failed: Error: boom$/);
  });

  it('parses level names', () => {
    expect(parseLogLevel('Warning')).to.equal(LogLevel.WARN);
    expect(parseLogLevel('trace')).to.equal(LogLevel.DEBUG);
    expect(parseLogLevel('loud')).to.equal(LogLevel.INFO);
    expect(parseLogLevel(3)).to.equal(LogLevel.ERROR);
  });

  it('names debug files after the local time', () => {
    expect(defaultLogFileName(new Date(2024, 0, 2, 3, 4, 5))).to.equal('./kubeglance-debug-20240102030405.log');
  });
});
