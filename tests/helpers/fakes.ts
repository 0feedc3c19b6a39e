import { MemoryCacheStore } from '../../src/core/cache/index.js';
import { SummarizeError } from '../../src/core/errors.js';
import { createChunkSystemPrompt, createMergeSystemPrompt } from '../../src/core/gemini/prompts.js';
import type {
  AudioDownloader,
  AudioTranscriber,
  CompletionRequest,
  DownloadedAudio,
  LanguageModel,
  Resolution,
  VideoResolver,
} from '../../src/core/providers.js';
import { parseVideoId } from '../../src/core/youtube/index.js';
import type { Transcript, VideoInfo, VideoRef } from '../../src/types/index.js';

export function videoInfo(videoId: string): VideoInfo {
  return {
    videoId,
    url: `https://www.youtube.com/watch?v=${videoId}`,
    title: `Video ${videoId}`,
    description: '',
    channelTitle: 'Test Channel',
    publishedAt: '2024-01-01T00:00:00Z',
    duration: 'PT10M',
    durationSeconds: 600,
  };
}

export function summaryResponse(markdown: string): string {
  return JSON.stringify({ scratchpad: 'notes', summary: markdown });
}

export class FakeResolver implements VideoResolver {
  calls: string[] = [];
  private result: Resolution | SummarizeError;
  private cheapIds: boolean;

  constructor(result: Resolution | SummarizeError, options: { cheapIds?: boolean } = {}) {
    this.result = result;
    this.cheapIds = options.cheapIds ?? true;
  }

  async resolve(url: string): Promise<Resolution> {
    this.calls.push(url);
    await Promise.resolve();
    if (this.result instanceof SummarizeError) throw this.result;
    return this.result;
  }

  videoIdFromUrl(url: string): string | null {
    return this.cheapIds ? parseVideoId(url) : null;
  }
}

export class FakeDownloader implements AudioDownloader {
  calls: VideoRef[] = [];
  cleanups = 0;
  private hangUntilAborted: boolean;

  /** With `hangUntilAborted` the download only ends, with an error, when its signal fires. */
  constructor(options: { hangUntilAborted?: boolean } = {}) {
    this.hangUntilAborted = options.hangUntilAborted ?? false;
  }

  async download(video: VideoRef, signal?: AbortSignal): Promise<DownloadedAudio> {
    this.calls.push(video);
    if (this.hangUntilAborted) {
      await new Promise<never>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('yt-dlp was killed')), { once: true });
      });
    }
    return {
      path: `/tmp/audio-${video.videoId}.m4a`,
      mimeType: 'audio/mp4',
      cleanup: async () => {
        this.cleanups++;
      },
    };
  }
}

export class FakeTranscriber implements AudioTranscriber {
  calls: VideoRef[] = [];
  private text: string | Error;

  constructor(text: string | Error) {
    this.text = text;
  }

  async transcribe(video: VideoRef): Promise<Transcript> {
    this.calls.push(video);
    if (this.text instanceof Error) throw this.text;
    return { videoId: video.videoId, text: this.text, source: 'transcribed' };
  }
}

type Responder = (request: CompletionRequest) => string | Promise<string>;

const defaultResponder: Responder = (request) =>
  request.system === createMergeSystemPrompt()
    ? summaryResponse('# Merged title\n\n## Overview\n- merged point')
    : summaryResponse('# Chunk summary\n\n## Points\n- point');

export class FakeLanguageModel implements LanguageModel {
  requests: CompletionRequest[] = [];
  private respond: Responder;

  constructor(respond: Responder = defaultResponder) {
    this.respond = respond;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }

  get chunkCalls(): CompletionRequest[] {
    return this.requests.filter((request) => request.system === createChunkSystemPrompt());
  }

  get mergeCalls(): CompletionRequest[] {
    return this.requests.filter((request) => request.system === createMergeSystemPrompt());
  }
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Memory store that remembers every key written. */
export class RecordingCache extends MemoryCacheStore {
  writes: string[] = [];

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.writes.push(key);
    await super.set(key, value, ttlSeconds);
  }
}

/** Exactly 9000 characters: 90 sentences of 100 characters including the joining space. */
export function nineThousandCharacters(): string {
  const sentence = (length: number): string => 'word '.repeat(Math.ceil(length / 5)).slice(0, length - 1) + '.';
  const sentences = [sentence(100)];
  for (let i = 1; i < 90; i++) {
    sentences.push(sentence(99));
  }
  return sentences.join(' ');
}
