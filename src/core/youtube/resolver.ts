import { SummarizeError } from '../errors.js';
import type { Resolution, VideoResolver } from '../providers.js';
import type { VideoInfo } from '../../types/index.js';
import type { YouTubeClient } from './client.js';

export interface YouTubeResolverOptions {
  /** Caption languages in order of preference. */
  languages: string[];
}

export class YouTubeResolver implements VideoResolver {
  private youtube: YouTubeClient;
  private languages: string[];

  constructor(youtube: YouTubeClient, options: YouTubeResolverOptions) {
    this.youtube = youtube;
    this.languages = options.languages;
  }

  videoIdFromUrl(url: string): string | null {
    try {
      return this.youtube.parseVideoId(url);
    } catch {
      return null;
    }
  }

  async resolve(url: string): Promise<Resolution> {
    const videoId = this.videoIdFromUrl(url);
    if (!videoId) {
      throw new SummarizeError('InvalidURL', `Not a YouTube video URL: ${url}`);
    }

    let video: VideoInfo;
    try {
      video = await this.youtube.getVideo(videoId);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new SummarizeError('VideoUnavailable', `Video ${videoId} is unavailable: ${detail}`, {
        cause: error,
      });
    }

    const captions = await this.youtube.getCaptions(videoId, this.languages);
    if (captions.isManual && captions.text) {
      return {
        kind: 'transcript',
        video,
        transcript: { videoId, text: captions.text, source: 'platform' },
      };
    }

    return { kind: 'needs_audio', video };
  }
}
