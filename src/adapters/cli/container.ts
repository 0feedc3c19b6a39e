import {
  Summarizer,
  FileCacheStore,
  YouTubeClient,
  YouTubeResolver,
  YtDlpAudioDownloader,
  GeminiClient,
  GeminiTranscriber,
  DeepgramTranscriber,
  TranscriptSummarizer,
  type AudioTranscriber,
  type SummarizerCallbacks,
} from '../../core/index.js';
import type { AppConfig } from './config.js';

function createTranscriber(config: AppConfig, gemini: GeminiClient, onDebug?: (message: string) => void): AudioTranscriber {
  const { transcriptionBackend, language } = config.pipeline;

  if (transcriptionBackend === 'deepgram') {
    if (!config.deepgramApiKey) {
      throw new Error('DEEPGRAM_API_KEY is required for the deepgram transcription backend');
    }
    return new DeepgramTranscriber({ apiKey: config.deepgramApiKey, language });
  }
  return new GeminiTranscriber(gemini, language, { onDebug });
}

export function createSummarizer(config: AppConfig, callbacks: SummarizerCallbacks = {}): Summarizer {
  const { onDebug, onWarning } = callbacks;

  const youtube = new YouTubeClient(config.youtubeApiKey, { onWarning });
  const gemini = new GeminiClient({
    ...config.gemini,
    onRetry: (attempt, maxRetries, error) =>
      onWarning?.(`Gemini request failed (attempt ${attempt}/${maxRetries}): ${error}. Retrying...`),
  });

  const languages = config.pipeline.language === 'en' ? ['en'] : [config.pipeline.language, 'en'];

  return new Summarizer(
    {
      cache: new FileCacheStore(config.cacheDir),
      resolver: new YouTubeResolver(youtube, { languages }),
      downloader: new YtDlpAudioDownloader({ logger: { debug: onDebug } }),
      transcriber: createTranscriber(config, gemini, onDebug),
      transcriptSummarizer: new TranscriptSummarizer(gemini, {
        chunkLimit: config.pipeline.chunkLimit,
        onDebug,
      }),
    },
    config.pipeline,
    callbacks
  );
}
