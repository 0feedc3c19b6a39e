import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { GeminiClient } from '../../../src/core/gemini/index.js';
import { GeminiTranscriber } from '../../../src/core/transcription/index.js';

const video = { videoId: 'abc123', url: 'https://www.youtube.com/watch?v=abc123' };

describe('GeminiTranscriber', () => {
  let tempDir: string;
  let audioPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tube-digest-gemini-'));
    audioPath = join(tempDir, 'audio.m4a');
    await writeFile(audioPath, 'audio bytes');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('transcribes the audio file in the configured language', async () => {
    const gemini = new GeminiClient({ apiKey: 'test-key' });
    const transcribeAudio = vi.spyOn(gemini, 'transcribeAudio').mockResolvedValue('spoken words');
    const transcriber = new GeminiTranscriber(gemini, 'ko');

    const transcript = await transcriber.transcribe(video, { path: audioPath, mimeType: 'audio/mp4', cleanup: async () => {} });

    expect(transcribeAudio).toHaveBeenCalledWith({ data: Buffer.from('audio bytes'), mimeType: 'audio/mp4' }, 'ko', undefined);
    expect(transcript).toEqual({ videoId: 'abc123', text: 'spoken words', source: 'transcribed' });
  });

  it('hands Gemini the video URL when the audio is too large to send inline', async () => {
    const gemini = new GeminiClient({ apiKey: 'test-key' });
    const transcribeAudio = vi.spyOn(gemini, 'transcribeAudio').mockResolvedValue('inline words');
    const transcribeVideo = vi.spyOn(gemini, 'transcribeVideo').mockResolvedValue('remote words');
    const transcriber = new GeminiTranscriber(gemini, 'en', { maxInlineBytes: 4 });

    const transcript = await transcriber.transcribe(video, { path: audioPath, mimeType: 'audio/mp4', cleanup: async () => {} });

    expect(transcribeVideo).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abc123', 'en', undefined);
    expect(transcribeAudio).not.toHaveBeenCalled();
    expect(transcript.text).toBe('remote words');
  });

  it('reports failures as TranscriptionFailed', async () => {
    const gemini = new GeminiClient({ apiKey: 'test-key' });
    vi.spyOn(gemini, 'transcribeAudio').mockRejectedValue(new Error('Gemini API error: file too large'));
    const transcriber = new GeminiTranscriber(gemini, 'en');

    await expect(
      transcriber.transcribe(video, { path: audioPath, mimeType: 'audio/mp4', cleanup: async () => {} })
    ).rejects.toMatchObject({
      kind: 'TranscriptionFailed',
      message: 'Gemini transcription failed for abc123: Gemini API error: file too large',
    });
  });
});
