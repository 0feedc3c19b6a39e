import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

const { transcribeFile, createClient } = vi.hoisted(() => {
  const transcribeFile = vi.fn();
  const createClient = vi.fn(() => ({ listen: { prerecorded: { transcribeFile } } }));
  return { transcribeFile, createClient };
});

vi.mock('@deepgram/sdk', () => ({ createClient }));

import { DeepgramTranscriber } from '../../../src/core/transcription/index.js';

const video = { videoId: 'abc123', url: 'https://www.youtube.com/watch?v=abc123' };

describe('DeepgramTranscriber', () => {
  let tempDir: string;
  let audioPath: string;

  beforeEach(async () => {
    transcribeFile.mockReset();
    tempDir = await mkdtemp(join(tmpdir(), 'tube-digest-deepgram-'));
    audioPath = join(tempDir, 'audio.m4a');
    await writeFile(audioPath, 'audio bytes');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function audio() {
    return { path: audioPath, mimeType: 'audio/mp4', cleanup: async () => {} };
  }

  it('sends the audio file and returns the paragraph transcript', async () => {
    transcribeFile.mockResolvedValue({
      result: {
        results: {
          channels: [
            {
              alternatives: [{ transcript: 'flat text', paragraphs: { transcript: '\nFirst paragraph.\n\nSecond one.\n' } }],
            },
          ],
        },
      },
      error: null,
    });
    const transcriber = new DeepgramTranscriber({ apiKey: 'test-secret', language: 'ko' });

    const transcript = await transcriber.transcribe(video, audio());

    expect(createClient).toHaveBeenCalledWith('test-secret');
    expect(transcribeFile).toHaveBeenCalledWith(Buffer.from('audio bytes'), {
      model: 'nova-3',
      language: 'ko',
      smart_format: true,
      punctuate: true,
      paragraphs: true,
    });
    expect(transcript).toEqual({ videoId: 'abc123', text: 'First paragraph.\n\nSecond one.', source: 'transcribed' });
  });

  it('falls back to the flat transcript', async () => {
    transcribeFile.mockResolvedValue({
      result: { results: { channels: [{ alternatives: [{ transcript: ' flat text ' }] }] } },
      error: null,
    });
    const transcriber = new DeepgramTranscriber({ apiKey: 'test-secret', language: 'en' });

    expect((await transcriber.transcribe(video, audio())).text).toBe('flat text');
  });

  it('reports an API error as TranscriptionFailed', async () => {
    transcribeFile.mockResolvedValue({ result: null, error: new Error('Invalid credentials') });
    const transcriber = new DeepgramTranscriber({ apiKey: 'test-secret', language: 'en' });

    await expect(transcriber.transcribe(video, audio())).rejects.toMatchObject({
      kind: 'TranscriptionFailed',
      message: 'Deepgram transcription failed: Invalid credentials',
    });
  });
});
