import { z } from 'zod';
import type { PipelineTimings } from './streaming/types';
import { ConfigError } from './types/errors';
import { createLogger, type LogLevel } from './utils/logger';

const log = createLogger('config');

// ===== STREAMER CONFIGURATION =====

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export const AUDIO_PLAYERS = ['aplay', 'ffplay', 'sox'] as const;

export type AudioPlayer = (typeof AUDIO_PLAYERS)[number];

export interface ServerConfig {
  logLevel: LogLevel;
  controlPort: number;
  joinTimeoutMs: number;
}

export interface PiperConfig {
  piperPath: string;
  modelsDir: string;
  modelPath?: string;
  lang: string;
  voice?: string;
  lengthScale: number;
}

export interface OpenAITTSConfig {
  apiKey?: string;
  model: string;
  voice: (typeof OPENAI_VOICES)[number];
}

export interface DeviceConfig {
  type: 'process' | 'wav';
  player: AudioPlayer;
  // Bound on a graceful player stop before it is killed
  drainTimeoutMs: number;
  wavOutputDir: string;
}

export interface StreamerConfig {
  server: ServerConfig;
  pipeline: PipelineTimings;
  engine: 'piper' | 'openai';
  piper: PiperConfig;
  openai: OpenAITTSConfig;
  device: DeviceConfig;
}

type Env = Record<string, string | undefined>;

// Empty strings count as unset so `FOO=` in .env falls back to the default
const num = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number().finite());
const str = (fallback: string) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : v), z.string());
const optionalStr = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  LOG_LEVEL: str('info').pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  CONTROL_PORT: num(4020).pipe(z.number().int().min(1).max(65535)),
  JOIN_TIMEOUT_MS: num(100).pipe(z.number().int().min(0).max(10_000)),

  FRAME_SIZE: num(2048).pipe(z.number().int().min(64).max(65536)),
  AUDIO_QUEUE_CAPACITY: num(100).pipe(z.number().int().min(1).max(10_000)),
  PUSH_TIMEOUT_MS: num(20).pipe(z.number().int().min(1).max(1000)),
  PAUSE_POLL_MS: num(50).pipe(z.number().int().min(1).max(50)),
  LINE_END_DELAY_MS: num(250).pipe(z.number().int().min(0).max(5000)),

  TTS_ENGINE: str('piper').pipe(z.enum(['piper', 'openai'])),
  PIPER_PATH: str('piper'),
  PIPER_MODELS_DIR: str('./voice_models'),
  PIPER_MODEL: optionalStr,
  PIPER_LANG: str('en'),
  PIPER_VOICE: optionalStr,
  PIPER_LENGTH_SCALE: num(1).pipe(z.number().positive().max(4)),

  OPENAI_API_KEY: optionalStr,
  OPENAI_TTS_MODEL: str('tts-1'),
  OPENAI_TTS_VOICE: str('alloy').pipe(z.enum(OPENAI_VOICES)),

  AUDIO_DEVICE: str('process').pipe(z.enum(['process', 'wav'])),
  AUDIO_PLAYER: str('aplay').pipe(z.enum(AUDIO_PLAYERS)),
  PLAYER_DRAIN_TIMEOUT_MS: num(5000).pipe(z.number().int().min(0).max(60_000)),
  WAV_OUTPUT_DIR: str('./out'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// ===== CONFIGURATION LOADING =====

function loadServerConfig(env: ParsedEnv): ServerConfig {
  return {
    logLevel: env.LOG_LEVEL,
    controlPort: env.CONTROL_PORT,
    joinTimeoutMs: env.JOIN_TIMEOUT_MS,
  };
}

function loadPipelineConfig(env: ParsedEnv): PipelineTimings {
  return {
    frameSize: env.FRAME_SIZE,
    audioQueueCapacity: env.AUDIO_QUEUE_CAPACITY,
    pushTimeoutMs: env.PUSH_TIMEOUT_MS,
    pausePollMs: env.PAUSE_POLL_MS,
    lineEndDelayMs: env.LINE_END_DELAY_MS,
  };
}

function loadPiperConfig(env: ParsedEnv): PiperConfig {
  return {
    piperPath: env.PIPER_PATH,
    modelsDir: env.PIPER_MODELS_DIR,
    modelPath: env.PIPER_MODEL,
    lang: env.PIPER_LANG,
    voice: env.PIPER_VOICE,
    lengthScale: env.PIPER_LENGTH_SCALE,
  };
}

function loadOpenAIConfig(env: ParsedEnv): OpenAITTSConfig {
  return {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_TTS_MODEL,
    voice: env.OPENAI_TTS_VOICE,
  };
}

function loadDeviceConfig(env: ParsedEnv): DeviceConfig {
  return {
    type: env.AUDIO_DEVICE,
    player: env.AUDIO_PLAYER,
    drainTimeoutMs: env.PLAYER_DRAIN_TIMEOUT_MS,
    wavOutputDir: env.WAV_OUTPUT_DIR,
  };
}

// ===== CONFIGURATION VALIDATION =====

function validateConfig(config: StreamerConfig): void {
  const errors: string[] = [];

  if (config.engine === 'openai' && !config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required when TTS_ENGINE=openai');
  }
  if (config.device.type === 'wav' && !config.device.wavOutputDir.trim()) {
    errors.push('WAV_OUTPUT_DIR is required when AUDIO_DEVICE=wav');
  }

  if (errors.length > 0) throw new ConfigError(errors);
}

// ===== MAIN CONFIGURATION LOADER =====

export function loadStreamerConfig(rawEnv: Env = process.env): StreamerConfig {
  try {
    const parsed = EnvSchema.safeParse(rawEnv);
    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
    }
    const env = parsed.data;

    const config: StreamerConfig = {
      server: loadServerConfig(env),
      pipeline: loadPipelineConfig(env),
      engine: env.TTS_ENGINE,
      piper: loadPiperConfig(env),
      openai: loadOpenAIConfig(env),
      device: loadDeviceConfig(env),
    };

    validateConfig(config);

    log.debug('Configuration loaded', {
      engine: config.engine,
      device: config.device.type,
      frameSize: config.pipeline.frameSize,
      audioQueueCapacity: config.pipeline.audioQueueCapacity,
    });

    return config;
  } catch (error) {
    const msg = (error instanceof Error) ? error.message : String(error);
    log.error('Failed to load streamer configuration:', msg);
    throw error;
  }
}
