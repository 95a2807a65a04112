import { WebSocket, WebSocketServer, type RawData } from 'ws';
import {
  ControlCommandSchema,
  EnvelopeSchema,
  nowTs,
  type ControlCommand,
  type ServerEvent,
} from '@readaloud/types';
import type { SpeechStreamer, SpeechStreamerCallbacks } from './streaming/speech-streamer';
import { createLogger, errorMessage } from './utils/logger';

const log = createLogger('control');

// Max accepted command size (bytes)
export const MAX_COMMAND_BYTES = 1024 * 1024;

export interface ControlServerOptions {
  port: number;
  host?: string;
  joinTimeoutMs: number;
  // Called for the first speak and again after every stop, since a stopped
  // streamer cannot be restarted
  createStreamer: (callbacks: SpeechStreamerCallbacks) => SpeechStreamer;
}

function sendJson(ws: WebSocket, msg: ServerEvent) {
  if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
}

function sendError(ws: WebSocket, code: string, message: string, details?: unknown) {
  sendJson(ws, { type: 'error', ts: nowTs(), data: { code, message, recoverable: true, details } });
}

export class ControlServer {
  private wss: WebSocketServer | null = null;
  private streamer: SpeechStreamer | null = null;
  private options: ControlServerOptions;

  constructor(options: ControlServerOptions) {
    this.options = options;
  }

  get activeStreamer(): SpeechStreamer | null {
    return this.streamer;
  }

  /**
   * Listen and resolve with the bound port (useful with port 0).
   */
  async start(): Promise<number> {
    const wss = new WebSocketServer({ port: this.options.port, host: this.options.host, maxPayload: MAX_COMMAND_BYTES });
    await new Promise<void>((resolve, reject) => {
      wss.once('listening', () => resolve());
      wss.once('error', reject);
    });
    wss.on('error', (e: Error) => log.error('Server error:', e.message));
    wss.on('connection', (ws) => this.handleConnection(ws));
    this.wss = wss;

    const address = wss.address();
    const port = address !== null && typeof address === 'object' ? address.port : this.options.port;
    log.info('Control server listening on port', port);
    return port;
  }

  private handleConnection(ws: WebSocket): void {
    log.debug('Client connected, clients=', this.wss?.clients.size);
    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        sendError(ws, 'bad_request', 'Binary frames are not accepted');
        return;
      }
      this.handleMessage(ws, data.toString());
    });
    ws.on('close', () => log.debug('Client disconnected'));
    ws.on('error', (e: Error) => log.warn('Client socket error:', e.message));
  }

  private handleMessage(ws: WebSocket, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      sendError(ws, 'bad_json', 'Message is not valid JSON');
      return;
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      sendError(ws, 'bad_envelope', 'Message is missing type or ts', envelope.error.issues);
      return;
    }

    const command = ControlCommandSchema.safeParse(json);
    if (!command.success) {
      sendError(ws, 'bad_command', `Unsupported or malformed command: ${envelope.data.type}`, command.error.issues);
      return;
    }

    try {
      this.handleCommand(command.data);
    } catch (e: unknown) {
      sendError(ws, 'command_failed', errorMessage(e));
    }
  }

  handleCommand(command: ControlCommand): void {
    log.debug('Command', command.type);
    switch (command.type) {
      case 'speak': {
        const streamer = this.ensureStreamer();
        streamer.speakAll(command.data.lines);
        break;
      }
      case 'pause':
        this.streamer?.pause();
        break;
      case 'resume':
        this.streamer?.resume();
        break;
      case 'stop':
        this.streamer?.stop();
        break;
    }
  }

  broadcast(event: ServerEvent): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) sendJson(client, event);
  }

  private ensureStreamer(): SpeechStreamer {
    if (this.streamer && !this.streamer.stopping) return this.streamer;

    this.streamer = this.options.createStreamer({
      onLineStart: (text) => this.broadcast({ type: 'line.start', ts: nowTs(), data: { text } }),
      onLineEnd: (text, gapMs) => this.broadcast({ type: 'line.end', ts: nowTs(), data: { text, gapMs } }),
      onStateChange: (state, paused) => this.broadcast({ type: 'pipeline.state', ts: nowTs(), data: { state, paused } }),
      onError: (error, source) =>
        this.broadcast({
          type: 'error',
          ts: nowTs(),
          data: { code: `${source}_error`, message: error.message, recoverable: true },
        }),
    });
    return this.streamer;
  }

  async close(): Promise<void> {
    // Detach clients first so shutdown events are not broadcast to them
    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) client.terminate();
    }

    const streamer = this.streamer;
    this.streamer = null;
    if (streamer) await streamer.shutdown(this.options.joinTimeoutMs);

    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    log.info('Control server closed');
  }
}
