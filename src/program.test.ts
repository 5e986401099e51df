import { describe, it, expect, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { InterruptError, RunFailedError, SelectionError } from './errors.js';
import {
  CommandHandlers,
  EXIT_ERROR,
  EXIT_INTERRUPTED,
  buildProgram,
  exitCodeFor,
  parseSeconds,
  toRunOptions,
} from './program.js';

const fakeHandlers = () => ({
  scrape: vi.fn<CommandHandlers['scrape']>(async () => 0),
  squids: vi.fn<CommandHandlers['squids']>(async () => 0),
  accounts: vi.fn<CommandHandlers['accounts']>(async () => 0),
  deleteSquid: vi.fn<CommandHandlers['deleteSquid']>(async () => 0),
});

async function parse(args: string[]) {
  const handlers = fakeHandlers();
  const codes: number[] = [];
  await buildProgram(handlers, async task => {
    codes.push(await task);
  }).parseAsync(args, { from: 'user' });
  return { handlers, codes };
}

describe('program', () => {
  it('parses scrape flags', async () => {
    const { handlers, codes } = await parse(['-l', 'profiles.txt', '-e', '--interval', '2.5', '--new-squid']);

    expect(handlers.scrape).toHaveBeenCalledTimes(1);
    expect(handlers.scrape.mock.calls[0][0]).toEqual({
      list: 'profiles.txt',
      email: true,
      interval: 2.5,
      newSquid: true,
    });
    expect(codes).toEqual([0]);
  });

  it('routes sub-commands', async () => {
    const { handlers } = await parse(['delete-squid', 'abc']);

    expect(handlers.deleteSquid).toHaveBeenCalledWith('abc');
    expect(handlers.scrape).not.toHaveBeenCalled();
  });

  it('maps flags to run options', () => {
    expect(toRunOptions({})).toMatchObject({ interactive: true, input: { url: undefined, list: undefined } });
    expect(toRunOptions({ list: 'urls.txt' }).interactive).toBe(false);
    expect(toRunOptions({ url: 'https://www.linkedin.com/in/a', interactive: true }).interactive).toBe(true);
    expect(toRunOptions({ squid: 's1', account: 'a1', empty: true })).toMatchObject({
      squidId: 's1',
      accountId: 'a1',
      emptySquid: true,
      enrichEmail: false,
    });
  });

  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new InterruptError())).toBe(EXIT_INTERRUPTED);
    expect(exitCodeFor(new SelectionError('ambiguous'))).toBe(EXIT_ERROR);
    expect(exitCodeFor(new RunFailedError('run-1'))).toBe(EXIT_ERROR);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_ERROR);
  });

  it('accepts polling intervals of one second or more', () => {
    expect(parseSeconds('2.5')).toBe(2.5);
    expect(parseSeconds('1')).toBe(1);
    expect(() => parseSeconds('0.0004')).toThrow(InvalidArgumentError);
    expect(() => parseSeconds('soon')).toThrow(InvalidArgumentError);
  });
});
