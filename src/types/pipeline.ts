export type PipelineStage = 'resolving' | 'transcribing' | 'summarizing' | 'done' | 'failed';

export type TranscriptionBackend = 'gemini' | 'deepgram';

export const TRANSCRIPTION_BACKENDS: readonly TranscriptionBackend[] = ['gemini', 'deepgram'];

export interface PipelineConfig {
  chunkLimit: number;
  transcriptTtlSeconds: number; // 0 = no expiry
  summaryTtlSeconds: number;
  transcriptionBackend: TranscriptionBackend;
  language: string;
  dedupeInFlight: boolean;
}
