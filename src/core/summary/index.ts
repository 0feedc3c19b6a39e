export { splitInChunks } from './chunker.js';
export {
  extractSummaryMarkdown,
  parseSummaryMarkdown,
  parseSummaryResponse,
  fixUnescapedQuotes,
} from './parser.js';
export { TranscriptSummarizer, type TranscriptSummarizerOptions } from './summarizer.js';
