import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { PassThrough } from 'stream';

vi.mock('../providers/factory', () => ({
  ProviderFactory: { createEngine: vi.fn(), createDevice: vi.fn() },
}));

vi.mock('../lib/document-reader', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/document-reader')>()),
  readDocument: vi.fn(),
}));

import { COMMAND_PROMPT, main, parseCommand } from '../cli';
import { readDocument } from '../lib/document-reader';
import { ProviderFactory } from '../providers/factory';
import { FakeDevice, FakeEngine, waitFor } from './fakes';

// Stands in for stdin/stdout; answers a prompt only once it has been shown
class Terminal {
  input = new PassThrough();
  output = new PassThrough();
  shown = '';

  constructor() {
    this.output.on('data', (d: Buffer) => {
      this.shown += d.toString();
    });
  }

  async answer(prompt: string, times: number, reply: string): Promise<void> {
    await waitFor(() => this.shown.split(prompt).length - 1 >= times);
    this.input.write(`${reply}\n`);
  }
}

describe('parseCommand', () => {
  it('should accept short and long forms', () => {
    expect(parseCommand('p')).toBe('pause');
    expect(parseCommand('Pause')).toBe('pause');
    expect(parseCommand(' r ')).toBe('resume');
    expect(parseCommand('stop')).toBe('stop');
    expect(parseCommand('q')).toBe('quit');
    expect(parseCommand('exit')).toBe('quit');
  });

  it('should flag anything else as unknown', () => {
    expect(parseCommand('')).toBe('unknown');
    expect(parseCommand('play')).toBe('unknown');
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print usage when no document is given', async () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await main([]);

    expect(out).toHaveBeenCalledTimes(1);
    expect(String(out.mock.calls[0][0])).toMatch(/^Usage:/);
  });

  it('should reject a start page that is not a positive integer', async () => {
    await expect(main(['book.pdf', '--page', '0'])).rejects.toThrow('--page must be a positive integer');
  });
});

describe('main reading a document', () => {
  let device: FakeDevice;
  let terminal: Terminal;
  let out: MockInstance;

  const speaking = (text: string) => `\n### NOW SPEAKING ###\n${text}\n`;

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'error');
    vi.stubEnv('TTS_ENGINE', 'piper');
    vi.stubEnv('AUDIO_DEVICE', 'process');
    vi.stubEnv('LINE_END_DELAY_MS', '0');
    vi.stubEnv('PAUSE_POLL_MS', '10');
    vi.stubEnv('JOIN_TIMEOUT_MS', '200');

    device = new FakeDevice();
    terminal = new Terminal();
    out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    vi.mocked(ProviderFactory.createEngine).mockResolvedValue(new FakeEngine());
    vi.mocked(ProviderFactory.createDevice).mockReturnValue(device);
    vi.mocked(readDocument).mockResolvedValue({
      source: 'book.pdf',
      sourceType: 'pdf',
      pages: ['Intro page.', 'First line here.\nSecond line. Third one.'],
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should read from the given page and return once playback drains', async () => {
    await main(['book.pdf', '--page', '2'], terminal);

    expect(readDocument).toHaveBeenCalledWith('book.pdf');
    expect(out).toHaveBeenCalledWith('Total sentences to read: 3');
    expect(out).toHaveBeenCalledWith(speaking('First line here.'));
    expect(out).toHaveBeenCalledWith(speaking('Third one.'));
    expect(out).not.toHaveBeenCalledWith(speaking('Intro page.'));
    expect(device.totalWrites).toBe(6);
    expect(device.current?.stopCalls).toBe(1);
    expect(device.current?.abortCalls).toBe(0);
  });

  it('should ask for the page and line when none are given', async () => {
    const done = main(['book.pdf'], terminal);

    await terminal.answer('Enter start page (1-indexed): ', 1, '2');
    await terminal.answer('Start reading from line: ', 1, '2');
    await done;

    expect(out).toHaveBeenCalledWith('\nDocument has 2 pages.\n');
    expect(out).toHaveBeenCalledWith('1: First line here.');
    expect(out).toHaveBeenCalledWith('Total sentences to read: 2');
    expect(out).toHaveBeenCalledWith(speaking('Second line.'));
    expect(out).not.toHaveBeenCalledWith(speaking('First line here.'));
  });

  it('should pause, resume and quit on command', async () => {
    device.blockWrites = true;
    const done = main(['book.pdf', '--page', '2'], terminal);
    await waitFor(() => device.totalWrites === 1);

    await terminal.answer(COMMAND_PROMPT, 1, 'p');
    await terminal.answer(COMMAND_PROMPT, 2, 'r');
    await terminal.answer(COMMAND_PROMPT, 3, 'q');
    await done;

    expect(out).toHaveBeenCalledWith('Paused.');
    expect(out).toHaveBeenCalledWith('Resumed.');
    // Quitting cuts playback off instead of draining it
    expect(device.current?.abortCalls).toBe(1);
    expect(device.current?.stopCalls).toBe(0);
    expect(device.current?.closeCalls).toBe(1);
  });

  it('should return on its own after stop', async () => {
    device.blockWrites = true;
    const done = main(['book.pdf', '--page', '2'], terminal);
    await waitFor(() => device.totalWrites === 1);

    await terminal.answer(COMMAND_PROMPT, 1, 's');
    await done;

    expect(out).toHaveBeenCalledWith('Stopped.');
    expect(device.current?.abortCalls).toBe(1);
    expect(device.current?.closeCalls).toBe(1);
  });

  it('should report unknown commands and keep prompting', async () => {
    device.blockWrites = true;
    const done = main(['book.pdf', '--page', '2'], terminal);
    await waitFor(() => device.totalWrites === 1);

    await terminal.answer(COMMAND_PROMPT, 1, 'rewind');
    await terminal.answer(COMMAND_PROMPT, 2, 'q');
    await done;

    expect(out).toHaveBeenCalledWith('Unknown command.');
  });
});
