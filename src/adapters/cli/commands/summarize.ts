import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { MarkdownGenerator, isSummarizeError } from '../../../core/index.js';
import { ConfigError, loadConfig, type AppConfig } from '../config.js';
import { createSummarizer } from '../container.js';

loadEnv();

interface SummarizeCommandOptions {
  language?: string;
  chunkLimit?: string;
  backend?: string;
  model?: string;
  cacheDir?: string;
  output?: string;
  json?: boolean;
  verbose?: boolean;
}

export function createSummarizeCommand(): Command {
  const command = new Command('summarize')
    .description('Summarize a YouTube video from its captions or transcribed audio')
    .argument('<url>', 'YouTube video URL')
    .option('-l, --language <code>', 'caption / transcription language (SUMMARY_LANGUAGE)')
    .option('-c, --chunk-limit <chars>', 'maximum characters per summarization chunk (CHUNK_LIMIT)')
    .option('-b, --backend <name>', 'transcription backend: gemini | deepgram (TRANSCRIPTION_BACKEND)')
    .option('-m, --model <model>', 'Gemini model name (GEMINI_MODEL)')
    .option('--cache-dir <dir>', 'cache directory (CACHE_DIR)')
    .option('-o, --output <file>', 'also write the summary as a markdown file')
    .option('--json', 'print the summary as JSON')
    .option('--verbose', 'print debug output and stack traces')
    .action(async (url: string, options: SummarizeCommandOptions) => {
      // Progress goes to stderr when stdout carries JSON
      const log = options.json ? console.error : console.log;

      let config: AppConfig;
      try {
        config = loadConfig(process.env, options);
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(`❌ ${error.message}`);
          process.exit(1);
        }
        throw error;
      }

      if (options.verbose) {
        log(`🤖 Gemini model: ${config.gemini.model}, transcription: ${config.pipeline.transcriptionBackend}`);
      }

      const summarizer = createSummarizer(config, {
        onProgress: (message) => log(`ℹ️  ${message}`),
        onDebug: options.verbose ? (message) => log(`🔍 ${message}`) : undefined,
        onWarning: (message) => console.warn(`⚠️ ${message}`),
      });

      const controller = new AbortController();
      const abort = (): void => controller.abort(new Error('Interrupted'));
      process.once('SIGINT', abort);

      try {
        const summary = await summarizer.summarize(url, { signal: controller.signal });
        const markdown = new MarkdownGenerator();

        if (options.output) {
          await markdown.writeToFile(markdown.generate(summary, { frontmatter: true }), options.output);
          log(`ℹ️  Markdown saved: ${options.output}`);
        }

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          console.log(`\n${markdown.generate(summary)}`);
        }
      } catch (error) {
        if (isSummarizeError(error)) {
          console.error(`❌ ${error.kind}: ${error.message}`);
        } else if (error instanceof Error) {
          console.error(`❌ Error: ${error.message}`);
        } else {
          console.error('❌ Error:', error);
        }

        if (error instanceof Error) {
          if (options.verbose && error.stack) {
            console.error(`📋 Stack trace:\n${error.stack}`);
          }
          if (options.verbose && error.cause) {
            console.error(`🔗 Cause: ${error.cause}`);
          }
        }
        process.exit(1);
      } finally {
        process.off('SIGINT', abort);
      }
    });

  return command;
}
