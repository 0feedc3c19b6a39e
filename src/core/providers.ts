import type { Transcript, VideoInfo, VideoRef } from '../types/index.js';

export type Resolution =
  | { kind: 'transcript'; video: VideoInfo; transcript: Transcript }
  | { kind: 'needs_audio'; video: VideoInfo };

export interface VideoResolver {
  resolve(url: string): Promise<Resolution>;
  /** Cheap, offline derivation of the video id. Returns null when the URL needs full resolution. */
  videoIdFromUrl?(url: string): string | null;
}

export interface DownloadedAudio {
  path: string;
  mimeType: string;
  cleanup(): Promise<void>;
}

export interface AudioDownloader {
  download(video: VideoRef, signal?: AbortSignal): Promise<DownloadedAudio>;
}

export interface AudioTranscriber {
  transcribe(video: VideoRef, audio: DownloadedAudio, signal?: AbortSignal): Promise<Transcript>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}
