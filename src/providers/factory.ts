// ProviderFactory
// Constructs the synthesis engine and audio device named by configuration

import type { StreamerConfig } from '../streamer-config';
import { ConfigError } from '../types/errors';
import { createLogger } from '../utils/logger';
import type { AudioOutputDevice } from './audio/base';
import { ProcessAudioDevice } from './audio/process-device';
import { WavFileDevice } from './audio/wav-device';
import type { SynthesisEngine } from './tts/base';
import { OpenAISynthesisEngine } from './tts/openai';
import { PiperSynthesisEngine } from './tts/piper';
import { chooseVoice, listVoices } from './tts/voice-catalog';

const log = createLogger('factory');

export class ProviderFactory {
  static async createEngine(config: StreamerConfig): Promise<SynthesisEngine> {
    switch (config.engine) {
      case 'openai':
        return new OpenAISynthesisEngine({
          apiKey: config.openai.apiKey,
          model: config.openai.model,
          voice: config.openai.voice,
        });
      case 'piper':
      default: {
        const { piperPath, lengthScale } = config.piper;
        if (config.piper.modelPath) {
          return new PiperSynthesisEngine({ piperPath, modelPath: config.piper.modelPath, lengthScale });
        }
        const voices = await listVoices(config.piper.modelsDir);
        const voice = chooseVoice(voices, config.piper.lang, config.piper.voice);
        if (!voice) {
          throw new ConfigError([
            `No Piper voice for lang=${config.piper.lang}` +
              (config.piper.voice ? ` voice=${config.piper.voice}` : '') +
              ` under ${config.piper.modelsDir} (${voices.length} voices found)`,
          ]);
        }
        log.info('Using voice', voice.voice, voice.language, voice.quality);
        return new PiperSynthesisEngine({ piperPath, modelPath: voice.modelPath, configPath: voice.configPath, lengthScale });
      }
    }
  }

  static createDevice(config: StreamerConfig): AudioOutputDevice {
    switch (config.device.type) {
      case 'wav':
        return new WavFileDevice(config.device.wavOutputDir);
      case 'process':
      default:
        return new ProcessAudioDevice(config.device.player, config.device.drainTimeoutMs);
    }
  }
}
