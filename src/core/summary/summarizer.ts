import { SummarizeError, throwIfCancelled, toSummarizeError } from '../errors.js';
import {
  createChunkPrompt,
  createChunkSystemPrompt,
  createMergePrompt,
  createMergeSystemPrompt,
} from '../gemini/prompts.js';
import type { LanguageModel } from '../providers.js';
import type { Summary, SummaryChunk, Transcript } from '../../types/index.js';
import { splitInChunks } from './chunker.js';
import { extractSummaryMarkdown, parseSummaryMarkdown, parseSummaryResponse } from './parser.js';

export interface TranscriptSummarizerOptions {
  chunkLimit: number;
  onDebug?: (message: string) => void;
}

export class TranscriptSummarizer {
  private model: LanguageModel;
  private chunkLimit: number;
  private onDebug?: (message: string) => void;

  constructor(model: LanguageModel, options: TranscriptSummarizerOptions) {
    if (!Number.isInteger(options.chunkLimit) || options.chunkLimit < 1) {
      throw new RangeError(`Chunk limit must be a positive integer, got ${options.chunkLimit}`);
    }
    this.model = model;
    this.chunkLimit = options.chunkLimit;
    this.onDebug = options.onDebug;
  }

  async summarize(transcript: Transcript, signal?: AbortSignal): Promise<Summary> {
    if (!transcript.text.trim()) {
      throw new SummarizeError('EmptyTranscript', `Transcript for ${transcript.videoId} is empty`);
    }

    const chunks = splitInChunks(transcript.text, this.chunkLimit);
    this.onDebug?.(`Summarizing ${chunks.length} chunk(s) of ${transcript.videoId}`);

    // Promise.all keeps results positional, whatever order the calls finish in
    const summaryChunks = await Promise.all(
      chunks.map((chunk, index) => this.summarizeChunk(index, chunk, signal))
    );

    if (summaryChunks.length === 1) {
      return parseSummaryMarkdown(transcript.videoId, summaryChunks[0].summaryText);
    }

    this.onDebug?.(`Merging ${summaryChunks.length} chunk summaries of ${transcript.videoId}`);
    const response = await this.complete(
      createMergeSystemPrompt(),
      createMergePrompt(summaryChunks.map((chunk) => chunk.summaryText)),
      'merge',
      signal
    );
    return parseSummaryResponse(transcript.videoId, response);
  }

  private async summarizeChunk(index: number, sourceText: string, signal?: AbortSignal): Promise<SummaryChunk> {
    const response = await this.complete(
      createChunkSystemPrompt(),
      createChunkPrompt(sourceText),
      `chunk ${index}`,
      signal
    );
    return { index, sourceText, summaryText: extractSummaryMarkdown(response) };
  }

  private async complete(system: string, prompt: string, label: string, signal?: AbortSignal): Promise<string> {
    throwIfCancelled(signal);
    try {
      return await this.model.complete({ system, prompt, signal });
    } catch (error) {
      throwIfCancelled(signal);
      throw toSummarizeError(error, 'SummarizationFailed', `Summarization ${label} request failed`);
    }
  }
}
