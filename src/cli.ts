// Load environment variables FIRST, before anything reads process.env
import { config } from 'dotenv';
import * as path from 'path';

config({ path: path.resolve(process.cwd(), '.env') });

import * as readline from 'readline/promises';
import { parseArgs } from 'util';
import { ControlServer } from './control-server';
import { extractSentences, previewPage, readDocument, type ReadPosition } from './lib/document-reader';
import { ProviderFactory } from './providers/factory';
import { loadStreamerConfig, type StreamerConfig } from './streamer-config';
import { SpeechStreamer } from './streaming/speech-streamer';
import { createLogger, errorMessage, setLogLevel } from './utils/logger';

const log = createLogger('cli');

const USAGE = `Usage:
  readaloud <file.pdf|file.txt> [--page N] [--line N]   read a document aloud
  readaloud --serve [--port N]                          run the WebSocket control server`;

export const COMMAND_PROMPT = '\n[p]ause [r]esume [s]top [q]uit: ';

export interface CliIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export type CliCommand = 'pause' | 'resume' | 'stop' | 'quit' | 'unknown';

export function parseCommand(input: string): CliCommand {
  switch (input.trim().toLowerCase()) {
    case 'p':
    case 'pause':
      return 'pause';
    case 'r':
    case 'resume':
      return 'resume';
    case 's':
    case 'stop':
      return 'stop';
    case 'q':
    case 'quit':
    case 'exit':
      return 'quit';
    default:
      return 'unknown';
  }
}

function parsePositive(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`--${name} must be a positive integer`);
  return n;
}

async function askPosition(rl: readline.Interface, pageCount: number, preview: (page: number) => string[]): Promise<ReadPosition> {
  console.log(`\nDocument has ${pageCount} pages.\n`);
  const page = parsePositive(await rl.question('Enter start page (1-indexed): '), 'page') ?? 1;
  if (page > pageCount) throw new Error(`page ${page} is outside 1-${pageCount}`);

  console.log('\n--- Page Preview ---');
  preview(page - 1).forEach((line, i) => console.log(`${i + 1}: ${line}`));
  const line = parsePositive(await rl.question('\nStart reading from line: '), 'line') ?? 1;
  return { page: page - 1, line: line - 1 };
}

async function readAloud(cfg: StreamerConfig, io: CliIO, file: string, page?: number, line?: number): Promise<void> {
  const doc = await readDocument(file);
  const rl = readline.createInterface({ input: io.input, output: io.output });

  try {
    const position = page !== undefined
      ? { page: page - 1, line: (line ?? 1) - 1 }
      : await askPosition(rl, doc.pages.length, (p) => previewPage(doc, p));

    const sentences = extractSentences(doc, position);
    console.log(`Total sentences to read: ${sentences.length}`);

    const streamer = new SpeechStreamer({
      engine: await ProviderFactory.createEngine(cfg),
      device: ProviderFactory.createDevice(cfg),
      timings: cfg.pipeline,
      callbacks: {
        onLineStart: (text) => console.log(`\n### NOW SPEAKING ###\n${text}\n`),
        onError: (error, source) => log.warn(`${source}:`, error.message),
      },
    });
    streamer.speakAll(sentences);
    streamer.finish();

    // Either the document runs out or the user quits
    let done = false;
    const prompt = new AbortController();
    const drained = streamer.join().then(() => {
      done = true;
      prompt.abort();
    });

    while (!done) {
      let input: string;
      try {
        input = await rl.question(COMMAND_PROMPT, { signal: prompt.signal });
      } catch {
        break; // aborted because playback finished, or stdin closed
      }
      const command = parseCommand(input);
      if (command === 'pause') {
        streamer.pause();
        console.log('Paused.');
      } else if (command === 'resume') {
        streamer.resume();
        console.log('Resumed.');
      } else if (command === 'stop') {
        streamer.stop();
        console.log('Stopped.');
      } else if (command === 'quit') {
        await streamer.shutdown(cfg.server.joinTimeoutMs);
        break;
      } else {
        console.log('Unknown command.');
      }
    }

    if (streamer.stopping) {
      await streamer.join(cfg.server.joinTimeoutMs);
    } else {
      await drained;
    }
  } finally {
    rl.close();
  }
}

async function serve(cfg: StreamerConfig, port?: number): Promise<void> {
  const engine = await ProviderFactory.createEngine(cfg);
  const server = new ControlServer({
    port: port ?? cfg.server.controlPort,
    joinTimeoutMs: cfg.server.joinTimeoutMs,
    createStreamer: (callbacks) =>
      new SpeechStreamer({ engine, device: ProviderFactory.createDevice(cfg), timings: cfg.pipeline, callbacks }),
  });
  await server.start();

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
  await server.close();
}

export async function main(
  argv: string[] = process.argv.slice(2),
  io: CliIO = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      page: { type: 'string' },
      line: { type: 'string' },
      serve: { type: 'boolean', default: false },
      port: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || (!values.serve && positionals.length === 0)) {
    console.log(USAGE);
    return;
  }

  const cfg = loadStreamerConfig();
  setLogLevel(cfg.server.logLevel);

  if (values.serve) {
    await serve(cfg, parsePositive(values.port, 'port'));
  } else {
    await readAloud(cfg, io, positionals[0], parsePositive(values.page, 'page'), parsePositive(values.line, 'line'));
  }
  log.info('Program closed');
}

if (require.main === module) {
  main().catch((e: unknown) => {
    log.error('Fatal:', errorMessage(e));
    process.exitCode = 1;
  });
}
