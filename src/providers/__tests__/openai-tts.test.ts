import { describe, it, expect } from 'vitest';
import { OPENAI_PCM_SAMPLE_RATE, OpenAISynthesisEngine, type SpeechClient } from '../tts/openai';
import type { SynthesisChunk } from '../tts/base';

// Four samples of 16-bit PCM: 0, 0.5, -1 and the largest positive value
function pcm(): ArrayBuffer {
  const buf = new ArrayBuffer(8);
  const view = new DataView(buf);
  [0, 16384, -32768, 32767].forEach((v, i) => view.setInt16(i * 2, v, true));
  return buf;
}

function fakeClient(opts: { listFails?: boolean } = {}) {
  const requests: unknown[] = [];
  const client: SpeechClient = {
    audio: {
      speech: {
        create: async (params) => {
          requests.push(params);
          return { arrayBuffer: async () => pcm() };
        },
      },
    },
    models: {
      list: async () => {
        if (opts.listFails) throw new Error('401 Unauthorized');
        return { data: [] };
      },
    },
  };
  return { client, requests };
}

async function collect(iter: AsyncIterable<SynthesisChunk>): Promise<SynthesisChunk[]> {
  const chunks: SynthesisChunk[] = [];
  for await (const chunk of iter) chunks.push(chunk);
  return chunks;
}

describe('OpenAISynthesisEngine', () => {
  it('should request raw PCM and decode it to float samples', async () => {
    const { client, requests } = fakeClient();
    const engine = new OpenAISynthesisEngine({ client });

    const chunks = await collect(engine.synthesize('  Hello there.  '));

    expect(requests).toEqual([{ model: 'tts-1', voice: 'alloy', input: 'Hello there.', response_format: 'pcm' }]);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].sampleRate).toBe(OPENAI_PCM_SAMPLE_RATE);
    expect(Array.from(chunks[0].samples)).toEqual([0, 0.5, -1, 32767 / 32768]);
  });

  it('should split the decoded audio into chunks of the configured size', async () => {
    const { client } = fakeClient();
    const engine = new OpenAISynthesisEngine({ client, chunkSamples: 3, model: 'tts-1-hd', voice: 'nova' });

    const chunks = await collect(engine.synthesize('Split me.'));

    expect(chunks.map((c) => c.samples.length)).toEqual([3, 1]);
  });

  it('should pass the configured model and voice', async () => {
    const { client, requests } = fakeClient();
    const engine = new OpenAISynthesisEngine({ client, model: 'tts-1-hd', voice: 'nova' });

    await collect(engine.synthesize('Hi.'));

    expect(requests).toEqual([{ model: 'tts-1-hd', voice: 'nova', input: 'Hi.', response_format: 'pcm' }]);
  });

  it('should yield nothing and make no request for blank text', async () => {
    const { client, requests } = fakeClient();
    const engine = new OpenAISynthesisEngine({ client });

    expect(await collect(engine.synthesize('   '))).toEqual([]);
    expect(requests).toEqual([]);
  });

  it('should report health from the models endpoint', async () => {
    expect(await new OpenAISynthesisEngine({ client: fakeClient().client }).healthCheck()).toBe(true);
    expect(await new OpenAISynthesisEngine({ client: fakeClient({ listFails: true }).client }).healthCheck()).toBe(false);
  });
});
