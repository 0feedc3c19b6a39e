import { cacheKey, ResilientCache, type CacheStore } from './cache/index.js';
import { SummarizeError, throwIfCancelled, toSummarizeError } from './errors.js';
import type { AudioDownloader, AudioTranscriber, Resolution, VideoResolver } from './providers.js';
import type { TranscriptSummarizer } from './summary/index.js';
import type { PipelineConfig, PipelineStage, Summary, Transcript, VideoInfo } from '../types/index.js';

export interface SummarizerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarning?: (message: string) => void;
  onStageChange?: (stage: PipelineStage, url: string) => void;
}

export interface SummarizerDependencies {
  cache: CacheStore;
  resolver: VideoResolver;
  downloader: AudioDownloader;
  transcriber: AudioTranscriber;
  transcriptSummarizer: TranscriptSummarizer;
}

export interface SummarizeOptions {
  signal?: AbortSignal;
}

/** A pipeline run shared by every concurrent request for the same video. */
interface Flight {
  promise: Promise<Summary>;
  controller: AbortController;
  /** Callers still waiting; the run is aborted once this drops to zero. */
  waiters: number;
}

function isTranscript(value: unknown): value is Transcript {
  return (
    typeof value === 'object' &&
    value !== null &&
    'videoId' in value && typeof value.videoId === 'string' &&
    'text' in value && typeof value.text === 'string' &&
    'source' in value && (value.source === 'platform' || value.source === 'transcribed')
  );
}

function isSummary(value: unknown): value is Summary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'videoId' in value && typeof value.videoId === 'string' &&
    'title' in value && typeof value.title === 'string' &&
    'sections' in value && Array.isArray(value.sections) &&
    value.sections.every(
      (section: unknown) =>
        typeof section === 'object' &&
        section !== null &&
        'heading' in section && typeof section.heading === 'string' &&
        'bullets' in section && Array.isArray(section.bullets) &&
        section.bullets.every((bullet: unknown) => typeof bullet === 'string')
    )
  );
}

/**
 * Runs resolve → transcribe → summarize for one URL, memoizing the transcript
 * and the summary of each video in the cache.
 */
export class Summarizer {
  private cache: CacheStore;
  private resolver: VideoResolver;
  private downloader: AudioDownloader;
  private transcriber: AudioTranscriber;
  private transcriptSummarizer: TranscriptSummarizer;
  private config: PipelineConfig;
  private callbacks: SummarizerCallbacks;
  private inFlight = new Map<string, Flight>();

  constructor(deps: SummarizerDependencies, config: PipelineConfig, callbacks: SummarizerCallbacks = {}) {
    this.cache = new ResilientCache(deps.cache, { warn: callbacks.onWarning });
    this.resolver = deps.resolver;
    this.downloader = deps.downloader;
    this.transcriber = deps.transcriber;
    this.transcriptSummarizer = deps.transcriptSummarizer;
    this.config = config;
    this.callbacks = callbacks;
  }

  async summarize(url: string, options: SummarizeOptions = {}): Promise<Summary> {
    const { signal } = options;
    throwIfCancelled(signal);

    if (!this.config.dedupeInFlight) {
      return this.run(url, signal);
    }

    const flightKey = this.resolver.videoIdFromUrl?.(url) ?? url;
    let flight = this.inFlight.get(flightKey);
    if (flight && !flight.controller.signal.aborted) {
      this.callbacks.onDebug?.(`Joining in-flight request for ${flightKey}`);
    } else {
      flight = this.startFlight(flightKey, url);
    }

    flight.waiters++;
    return this.waitFor(flight, signal);
  }

  private startFlight(flightKey: string, url: string): Flight {
    const controller = new AbortController();
    const flight: Flight = {
      controller,
      waiters: 0,
      promise: this.run(url, controller.signal).finally(() => {
        if (this.inFlight.get(flightKey) === flight) {
          this.inFlight.delete(flightKey);
        }
      }),
    };
    this.inFlight.set(flightKey, flight);
    return flight;
  }

  /**
   * Waits for a shared run on behalf of one caller. Aborting `signal` rejects only
   * this caller; the run itself is aborted when its last waiter leaves.
   */
  private waitFor(flight: Flight, signal?: AbortSignal): Promise<Summary> {
    if (!signal) return flight.promise;

    return new Promise<Summary>((resolve, reject) => {
      const onAbort = (): void => {
        flight.waiters--;
        if (flight.waiters === 0) {
          flight.controller.abort(signal.reason);
        }
        reject(new SummarizeError('Cancelled', 'Request was cancelled', { cause: signal.reason }));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (summary) => {
          signal.removeEventListener('abort', onAbort);
          resolve(summary);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async run(url: string, signal?: AbortSignal): Promise<Summary> {
    const { onProgress, onStageChange } = this.callbacks;

    try {
      onStageChange?.('resolving', url);
      throwIfCancelled(signal);

      // Fast path: the id is readable from the URL, so both caches can be checked before resolving
      let videoId = this.resolver.videoIdFromUrl?.(url) ?? null;
      let cachedTranscript: Transcript | null = null;

      if (videoId) {
        const cached = await this.readSummary(videoId);
        if (cached) return this.finish(url, cached);
        cachedTranscript = await this.readTranscript(videoId);
      }

      let transcript: Transcript;
      if (cachedTranscript) {
        onProgress?.(`Using cached transcript for ${cachedTranscript.videoId}`);
        transcript = cachedTranscript;
      } else {
        const resolution = await this.resolve(url);
        const video = resolution.video;
        onProgress?.(`Video: ${video.title || video.videoId}`);

        if (!videoId) {
          videoId = video.videoId;
          const cached = await this.readSummary(videoId);
          if (cached) return this.finish(url, cached);
          cachedTranscript = await this.readTranscript(videoId);
        }

        if (cachedTranscript) {
          transcript = cachedTranscript;
        } else if (resolution.kind === 'transcript') {
          onProgress?.('Using the video\'s own captions');
          transcript = resolution.transcript;
        } else {
          onStageChange?.('transcribing', url);
          transcript = await this.transcribe(video, signal);
        }
      }

      throwIfCancelled(signal);
      await this.cache.set(cacheKey('transcript', transcript.videoId), JSON.stringify(transcript), this.config.transcriptTtlSeconds);

      onStageChange?.('summarizing', url);
      onProgress?.(`Summarizing transcript (${transcript.text.length} characters)`);
      const summary = await this.transcriptSummarizer.summarize(transcript, signal);

      throwIfCancelled(signal);
      await this.cache.set(cacheKey('summary', summary.videoId), JSON.stringify(summary), this.config.summaryTtlSeconds);

      return this.finish(url, summary);
    } catch (error) {
      onStageChange?.('failed', url);
      throw error;
    }
  }

  private finish(url: string, summary: Summary): Summary {
    this.callbacks.onStageChange?.('done', url);
    return summary;
  }

  private async resolve(url: string): Promise<Resolution> {
    try {
      return await this.resolver.resolve(url);
    } catch (error) {
      throw toSummarizeError(error, 'VideoUnavailable', `Could not resolve ${url}`);
    }
  }

  private async transcribe(video: VideoInfo, signal?: AbortSignal): Promise<Transcript> {
    this.callbacks.onProgress?.('No captions available, transcribing audio');

    const audio = await this.downloader.download(video, signal).catch((error: unknown) => {
      throwIfCancelled(signal);
      throw toSummarizeError(error, 'TranscriptionFailed', `Audio download failed for ${video.videoId}`);
    });

    try {
      const transcript = await this.transcriber.transcribe(video, audio, signal);
      this.callbacks.onProgress?.(`Transcription complete (${transcript.text.length} characters)`);
      return transcript;
    } catch (error) {
      throwIfCancelled(signal);
      throw toSummarizeError(error, 'TranscriptionFailed', `Transcription failed for ${video.videoId}`);
    } finally {
      await audio.cleanup().catch((error: unknown) => {
        this.callbacks.onWarning?.(`Could not delete audio file ${audio.path}: ${error instanceof Error ? error.message : String(error)}`);
      });
    }
  }

  private async readSummary(videoId: string): Promise<Summary | null> {
    const summary = await this.readCached(cacheKey('summary', videoId), isSummary);
    if (summary) this.callbacks.onProgress?.(`Using cached summary for ${videoId}`);
    return summary;
  }

  private async readTranscript(videoId: string): Promise<Transcript | null> {
    return this.readCached(cacheKey('transcript', videoId), isTranscript);
  }

  private async readCached<T>(key: string, guard: (value: unknown) => value is T): Promise<T | null> {
    const raw = await this.cache.get(key);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      parsed = undefined;
      this.callbacks.onDebug?.(`Cache entry ${key} is not JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (guard(parsed)) return parsed;

    this.callbacks.onWarning?.(`Ignoring unreadable cache entry ${key}`);
    return null;
  }
}
