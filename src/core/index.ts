export {
  Summarizer,
  type SummarizerCallbacks,
  type SummarizerDependencies,
  type SummarizeOptions,
} from './summarizer.js';
export { SummarizeError, isSummarizeError, type SummarizeErrorKind } from './errors.js';
export type {
  VideoResolver,
  Resolution,
  AudioDownloader,
  DownloadedAudio,
  AudioTranscriber,
  LanguageModel,
  CompletionRequest,
} from './providers.js';
export type { Logger } from './logger.js';
export { cacheKey, MemoryCacheStore, FileCacheStore, ResilientCache, type CacheStore } from './cache/index.js';
export { YouTubeClient, YouTubeResolver } from './youtube/index.js';
export { YtDlpAudioDownloader } from './audio/index.js';
export { GeminiTranscriber, DeepgramTranscriber } from './transcription/index.js';
export { GeminiClient, type GeminiClientConfig } from './gemini/index.js';
export { TranscriptSummarizer, splitInChunks, parseSummaryMarkdown } from './summary/index.js';
export { MarkdownGenerator } from './output/index.js';
