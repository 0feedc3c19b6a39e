export { GeminiClient, type GeminiClientConfig, type AudioInput } from './client.js';
export {
  createChunkSystemPrompt,
  createMergeSystemPrompt,
  createChunkPrompt,
  createMergePrompt,
  createTranscriptionPrompt,
} from './prompts.js';
