export { GeminiTranscriber, DEFAULT_MAX_INLINE_AUDIO_BYTES, type GeminiTranscriberOptions } from './gemini.js';
export { DeepgramTranscriber, type DeepgramTranscriberConfig } from './deepgram.js';
