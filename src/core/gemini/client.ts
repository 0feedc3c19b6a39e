import { GoogleGenAI, type PartUnion } from '@google/genai';
import type { CompletionRequest, LanguageModel } from '../providers.js';
import { createTranscriptionPrompt } from './prompts.js';

export interface GeminiClientConfig {
  /** Gemini Developer API key. When absent, Vertex AI is used with projectId/location. */
  apiKey?: string;
  projectId?: string;
  location?: string;
  model?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  maxOutputTokens?: number;
  onRetry?: (attempt: number, maxRetries: number, error: string) => void;
}

export interface AudioInput {
  data: Buffer;
  mimeType: string;
}

export class GeminiClient implements LanguageModel {
  private client: GoogleGenAI;
  private modelName: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private maxOutputTokens: number;
  private onRetry?: (attempt: number, maxRetries: number, error: string) => void;

  constructor(config: GeminiClientConfig) {
    this.client = config.apiKey
      ? new GoogleGenAI({ apiKey: config.apiKey })
      : new GoogleGenAI({
          vertexai: true,
          project: config.projectId,
          location: config.location,
        });
    this.modelName = config.model || 'gemini-2.5-flash';
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 5000;
    this.maxOutputTokens = config.maxOutputTokens ?? 8192;
    this.onRetry = config.onRetry;
  }

  get model(): string {
    return this.modelName;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;

    const message = error.message.toLowerCase();
    return (
      message.includes('fetch failed') ||
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('503') ||
      message.includes('502') ||
      message.includes('429') ||
      message.includes('rate limit')
    );
  }

  private getErrorDetail(error: Error): string {
    const parts: string[] = [error.message];

    const cause = error.cause;
    if (cause instanceof Error) {
      parts.push(`[cause: ${cause.message}]`);
      if (cause.cause instanceof Error) {
        parts.push(`[root: ${cause.cause.message}]`);
      }
    } else if (cause) {
      parts.push(`[cause: ${String(cause)}]`);
    }

    if ('code' in error && typeof error.code === 'string') {
      parts.push(`[code: ${error.code}]`);
    }

    return parts.join(' ');
  }

  async complete(request: CompletionRequest): Promise<string> {
    return this.generate([{ text: request.prompt }], {
      systemInstruction: request.system,
      responseMimeType: 'application/json',
      signal: request.signal,
    });
  }

  async transcribeAudio(audio: AudioInput, language: string, signal?: AbortSignal): Promise<string> {
    const text = await this.generate(
      [
        { inlineData: { data: audio.data.toString('base64'), mimeType: audio.mimeType } },
        { text: createTranscriptionPrompt(language) },
      ],
      { signal }
    );
    return text.trim();
  }

  /** Transcribes a public video by URL; Gemini fetches the media itself. */
  async transcribeVideo(videoUrl: string, language: string, signal?: AbortSignal): Promise<string> {
    const text = await this.generate(
      [
        { fileData: { fileUri: videoUrl, mimeType: 'video/mp4' } },
        { text: createTranscriptionPrompt(language) },
      ],
      { signal }
    );
    return text.trim();
  }

  private async generate(
    contents: PartUnion[],
    options: { systemInstruction?: string; responseMimeType?: string; signal?: AbortSignal }
  ): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.models.generateContent({
          model: this.modelName,
          config: {
            systemInstruction: options.systemInstruction,
            responseMimeType: options.responseMimeType,
            maxOutputTokens: this.maxOutputTokens,
            abortSignal: options.signal,
          },
          contents,
        });

        const text = response.text;
        if (!text) {
          throw new Error('No text content in Gemini response');
        }

        return text;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (options.signal?.aborted || lastError.message.startsWith('No text content')) {
          throw lastError;
        }

        if (attempt < this.maxRetries && this.isRetryableError(error)) {
          const delayMs = this.retryDelayMs * Math.pow(2, attempt);
          this.onRetry?.(attempt + 1, this.maxRetries + 1, this.getErrorDetail(lastError));
          await this.sleep(delayMs);
          continue;
        }

        throw new Error(`Gemini API error: ${lastError.message}`, { cause: lastError });
      }
    }

    throw new Error(`Gemini API error: ${lastError?.message || 'Unknown error'}`);
  }
}
