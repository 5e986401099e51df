import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InterruptError } from '../errors.js';
import { TerminalPrompter } from './TerminalPrompter.js';

describe('TerminalPrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let signals: EventEmitter;
  let prompter: TerminalPrompter;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    signals = new EventEmitter();
    prompter = new TerminalPrompter(input, output, signals);
  });

  afterEach(() => {
    prompter.close();
  });

  it('answers consecutive questions from piped input', async () => {
    input.end('1\n  y  \n');

    expect(await prompter.ask('Select: ')).toBe('1');
    expect(await prompter.ask('Empty? ')).toBe('y');
    expect(String(output.read())).toBe('Select: Empty? ');
  });

  it('rejects once the input has ended', async () => {
    input.end('1\n');

    expect(await prompter.ask('Select: ')).toBe('1');
    await expect(prompter.ask('Again: ')).rejects.toBeInstanceOf(InterruptError);
  });

  it('rejects on Ctrl+C while waiting for an answer', async () => {
    const pending = prompter.ask('Select: ');
    signals.emit('SIGINT');

    await expect(pending).rejects.toBeInstanceOf(InterruptError);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('answers a question typed after it was asked', async () => {
    const pending = prompter.ask('Select: ');
    input.write('2\n');

    expect(await pending).toBe('2');
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('prints whole lines', () => {
    prompter.print('[1] ID: s1');

    expect(String(output.read())).toBe('[1] ID: s1\n');
  });
});
