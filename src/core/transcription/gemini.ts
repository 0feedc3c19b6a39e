import { readFile, stat } from 'fs/promises';
import { toSummarizeError } from '../errors.js';
import type { GeminiClient } from '../gemini/index.js';
import type { AudioTranscriber, DownloadedAudio } from '../providers.js';
import type { Transcript, VideoRef } from '../../types/index.js';

/** Inline requests are capped at 20 MB, and base64 grows the audio by a third. */
export const DEFAULT_MAX_INLINE_AUDIO_BYTES = 14 * 1024 * 1024;

export interface GeminiTranscriberOptions {
  maxInlineBytes?: number;
  onDebug?: (message: string) => void;
}

export class GeminiTranscriber implements AudioTranscriber {
  private gemini: GeminiClient;
  private language: string;
  private maxInlineBytes: number;
  private onDebug?: (message: string) => void;

  constructor(gemini: GeminiClient, language: string, options: GeminiTranscriberOptions = {}) {
    this.gemini = gemini;
    this.language = language;
    this.maxInlineBytes = options.maxInlineBytes ?? DEFAULT_MAX_INLINE_AUDIO_BYTES;
    this.onDebug = options.onDebug;
  }

  async transcribe(video: VideoRef, audio: DownloadedAudio, signal?: AbortSignal): Promise<Transcript> {
    try {
      const { size } = await stat(audio.path);

      let text: string;
      if (size > this.maxInlineBytes) {
        this.onDebug?.(`Audio is ${size} bytes, too large to send inline; transcribing ${video.url}`);
        text = await this.gemini.transcribeVideo(video.url, this.language, signal);
      } else {
        const data = await readFile(audio.path);
        text = await this.gemini.transcribeAudio({ data, mimeType: audio.mimeType }, this.language, signal);
      }

      return { videoId: video.videoId, text, source: 'transcribed' };
    } catch (error) {
      throw toSummarizeError(error, 'TranscriptionFailed', `Gemini transcription failed for ${video.videoId}`);
    }
  }
}
