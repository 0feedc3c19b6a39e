export type TranscriptSource = 'platform' | 'transcribed';

export interface Transcript {
  videoId: string;
  text: string;
  source: TranscriptSource;
}

export interface SummaryChunk {
  index: number;
  sourceText: string;
  summaryText: string;
}
