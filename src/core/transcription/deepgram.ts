import { readFile } from 'fs/promises';
import { createClient, type DeepgramClient } from '@deepgram/sdk';
import { SummarizeError, toSummarizeError } from '../errors.js';
import type { AudioTranscriber, DownloadedAudio } from '../providers.js';
import type { Transcript, VideoRef } from '../../types/index.js';

export interface DeepgramTranscriberConfig {
  apiKey: string;
  language: string;
  model?: string;
}

export class DeepgramTranscriber implements AudioTranscriber {
  private client: DeepgramClient;
  private language: string;
  private model: string;

  constructor(config: DeepgramTranscriberConfig) {
    this.client = createClient(config.apiKey);
    this.language = config.language;
    this.model = config.model ?? 'nova-3';
  }

  async transcribe(video: VideoRef, audio: DownloadedAudio): Promise<Transcript> {
    try {
      const buffer = await readFile(audio.path);
      const { result, error } = await this.client.listen.prerecorded.transcribeFile(buffer, {
        model: this.model,
        language: this.language,
        smart_format: true,
        punctuate: true,
        paragraphs: true,
      });

      if (error) {
        throw new SummarizeError('TranscriptionFailed', `Deepgram transcription failed: ${error.message}`, {
          cause: error,
        });
      }

      const alternative = result?.results?.channels?.[0]?.alternatives?.[0];
      const text = alternative?.paragraphs?.transcript ?? alternative?.transcript ?? '';

      return { videoId: video.videoId, text: text.trim(), source: 'transcribed' };
    } catch (error) {
      throw toSummarizeError(error, 'TranscriptionFailed', `Deepgram transcription failed for ${video.videoId}`);
    }
  }
}
