import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { FileCacheStore, cacheKey } from '../../../core/index.js';
import { videoIdFromInput } from '../../../core/youtube/index.js';
import { CACHE_NAMESPACES, type CacheNamespace } from '../../../types/index.js';
import { resolveCacheDir } from '../config.js';

loadEnv();

interface CacheCommandOptions {
  cacheDir?: string;
}

function openStore(options: CacheCommandOptions): FileCacheStore {
  return new FileCacheStore(resolveCacheDir(process.env, options.cacheDir));
}

function requireVideoId(input: string): string {
  const videoId = videoIdFromInput(input);
  if (!videoId) {
    console.error(`❌ Not a YouTube video URL or id: ${input}`);
    process.exit(1);
  }
  return videoId;
}

function parseStages(stage: string | undefined): readonly CacheNamespace[] {
  if (!stage) return CACHE_NAMESPACES;

  const match = CACHE_NAMESPACES.find((namespace) => namespace === stage);
  if (!match) {
    console.error(`❌ --stage must be one of ${CACHE_NAMESPACES.join(', ')}`);
    process.exit(1);
  }
  return [match];
}

export function formatCacheStatus(namespace: CacheNamespace, value: string | null): string {
  const label = namespace.padEnd(10);
  return value === null ? `   ⬚  ${label} not cached` : `   ✅ ${label} cached (${Buffer.byteLength(value)} bytes)`;
}

export function createCacheCommand(): Command {
  const command = new Command('cache').description('Inspect and invalidate cached transcripts and summaries');

  command
    .command('status')
    .description('Show which stages are cached for a video')
    .argument('<video>', 'YouTube video URL or id')
    .option('--cache-dir <dir>', 'cache directory (CACHE_DIR)')
    .action(async (video: string, options: CacheCommandOptions) => {
      const videoId = requireVideoId(video);
      const store = openStore(options);

      console.log(`🎬 ${videoId}`);
      for (const namespace of CACHE_NAMESPACES) {
        console.log(formatCacheStatus(namespace, await store.get(cacheKey(namespace, videoId))));
      }
    });

  command
    .command('invalidate')
    .description('Drop cached entries of a video')
    .argument('<video>', 'YouTube video URL or id')
    .option('-s, --stage <stage>', `only this stage: ${CACHE_NAMESPACES.join(' | ')}`)
    .option('--cache-dir <dir>', 'cache directory (CACHE_DIR)')
    .action(async (video: string, options: CacheCommandOptions & { stage?: string }) => {
      const videoId = requireVideoId(video);
      const store = openStore(options);

      for (const namespace of parseStages(options.stage)) {
        const removed = await store.delete(cacheKey(namespace, videoId));
        console.log(removed ? `🗑️  ${namespace}:${videoId} removed` : `⬚  ${namespace}:${videoId} was not cached`);
      }
    });

  command
    .command('clear')
    .description('Drop every cached entry')
    .option('--cache-dir <dir>', 'cache directory (CACHE_DIR)')
    .action(async (options: CacheCommandOptions) => {
      await openStore(options).clear();
      console.log('🗑️  Cache cleared');
    });

  return command;
}
