import { spawn } from 'child_process';
import { mkdir, rm, readdir } from 'fs/promises';
import { extname, join } from 'path';
import { tmpdir } from 'os';
import { SummarizeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { AudioDownloader, DownloadedAudio } from '../providers.js';
import type { VideoRef } from '../../types/index.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  signal?: AbortSignal
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, signal) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { signal });
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, code: code || 0 });
    });

    proc.on('error', (err) => {
      resolve({ stdout, stderr: err.message, code: 1 });
    });
  });
};

const AUDIO_MIME_TYPES: Record<string, string> = {
  m4a: 'audio/mp4',
  mp4: 'audio/mp4',
  webm: 'audio/webm',
  opus: 'audio/ogg',
  ogg: 'audio/ogg',
  mp3: 'audio/mpeg',
  aac: 'audio/aac',
  wav: 'audio/wav',
  flac: 'audio/flac',
};

export function audioMimeType(path: string): string {
  return AUDIO_MIME_TYPES[extname(path).slice(1).toLowerCase()] ?? 'application/octet-stream';
}

export interface YtDlpAudioDownloaderOptions {
  tempDir?: string;
  binary?: string;
  logger?: Logger;
  run?: CommandRunner;
}

/**
 * Fetches the best audio-only stream of a video with yt-dlp into a temp file.
 */
export class YtDlpAudioDownloader implements AudioDownloader {
  private tempDir: string;
  private binary: string;
  private logger?: Logger;
  private run: CommandRunner;

  constructor(options: YtDlpAudioDownloaderOptions = {}) {
    this.tempDir = options.tempDir ?? join(tmpdir(), 'tube-digest');
    this.binary = options.binary ?? 'yt-dlp';
    this.logger = options.logger;
    this.run = options.run ?? runCommand;
  }

  async download(video: VideoRef, signal?: AbortSignal): Promise<DownloadedAudio> {
    await mkdir(this.tempDir, { recursive: true });

    // yt-dlp picks the extension of whichever stream it ends up downloading
    const baseName = `audio-${video.videoId}-${Date.now()}`;
    const args = [
      '-f',
      'bestaudio[ext=m4a]/bestaudio',
      '-o',
      join(this.tempDir, `${baseName}.%(ext)s`),
      '--no-playlist',
      '--no-warnings',
      video.url,
    ];

    this.logger?.debug?.(`${this.binary} ${args.join(' ')}`);
    const result = await this.run(this.binary, args, signal);

    if (result.code !== 0) {
      await this.removeOutputs(baseName);
      throw new SummarizeError(
        'TranscriptionFailed',
        `${this.binary} failed (code ${result.code}): ${result.stderr.slice(0, 500)}`
      );
    }

    const files = await this.findOutputs(baseName);
    const file = files.find((name) => !name.endsWith('.part'));
    if (!file) {
      await this.removeOutputs(baseName);
      throw new SummarizeError('TranscriptionFailed', `${this.binary} produced no audio file for ${video.videoId}`);
    }

    const path = join(this.tempDir, file);
    this.logger?.debug?.(`Audio saved: ${path}`);
    return {
      path,
      mimeType: audioMimeType(path),
      cleanup: () => this.removeOutputs(baseName),
    };
  }

  private async findOutputs(baseName: string): Promise<string[]> {
    const files = await readdir(this.tempDir);
    return files.filter((name) => name.startsWith(`${baseName}.`));
  }

  private async removeOutputs(baseName: string): Promise<void> {
    const files = await this.findOutputs(baseName);
    await Promise.all(files.map((name) => rm(join(this.tempDir, name), { force: true })));
  }
}
