import * as fsp from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

export interface VoiceModel {
  modelPath: string;
  configPath: string;
  language: string;  // e.g. en_US
  voice: string;     // e.g. lessac
  quality: string;   // x_low | low | medium | high
}

// Piper voices are published as <lang>_<REGION>-<voice>-<quality>.onnx
const VOICE_FILE = /^([a-z]{2,3}_[A-Z]{2})-(.+)-(x_low|low|medium|high)\.onnx$/;

export function parseVoiceFileName(modelPath: string): Omit<VoiceModel, 'modelPath' | 'configPath'> | null {
  const match = VOICE_FILE.exec(path.basename(modelPath));
  if (!match) return null;
  const [, language, voice, quality] = match;
  return { language, voice, quality };
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * List every Piper voice under `root` that has its .onnx.json beside it.
 */
export async function listVoices(root: string): Promise<VoiceModel[]> {
  const files = await walk(root);
  const present = new Set(files);
  const voices: VoiceModel[] = [];

  for (const file of files) {
    if (!file.endsWith('.onnx')) continue;
    const parsed = parseVoiceFileName(file);
    const configPath = `${file}.json`;
    if (!parsed || !present.has(configPath)) continue;
    voices.push({ modelPath: file, configPath, ...parsed });
  }

  return voices.sort((a, b) => a.modelPath.localeCompare(b.modelPath));
}

/**
 * Pick the first voice whose language matches `lang` (either `en` or `en_US`)
 * and, when given, whose name is `voiceName`.
 */
export function chooseVoice(voices: VoiceModel[], lang: string, voiceName?: string): VoiceModel | null {
  const langMatches = (v: VoiceModel) => v.language === lang || v.language.split('_')[0] === lang;
  return voices.find((v) => langMatches(v) && (!voiceName || v.voice === voiceName)) ?? null;
}

const VoiceConfigSchema = z.object({
  audio: z.object({
    sample_rate: z.number().int().positive(),
  }),
});

/**
 * Read the output sample rate from a voice's .onnx.json.
 */
export async function readVoiceSampleRate(configPath: string): Promise<number> {
  const raw = await fsp.readFile(configPath, 'utf8');
  return VoiceConfigSchema.parse(JSON.parse(raw)).audio.sample_rate;
}
