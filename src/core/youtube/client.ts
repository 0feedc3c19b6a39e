import { google, youtube_v3 } from 'googleapis';
import type { VideoInfo, CaptionInfo, CaptionResult } from '../../types/index.js';
import { parseVideoId } from './parse-url.js';

export interface YouTubeClientOptions {
  /** Random pause before scraping caption text, to stay under timedtext rate limits. */
  captionDelayMs?: { min: number; max: number };
  onWarning?: (message: string) => void;
}

export class YouTubeClient {
  private youtube: youtube_v3.Youtube;
  private captionDelayMs: { min: number; max: number };
  private onWarning?: (message: string) => void;

  constructor(apiKey: string, options: YouTubeClientOptions = {}) {
    this.youtube = google.youtube({
      version: 'v3',
      auth: apiKey,
    });
    this.captionDelayMs = options.captionDelayMs ?? { min: 1000, max: 3000 };
    this.onWarning = options.onWarning;
  }

  parseVideoId(url: string): string {
    const videoId = parseVideoId(url);
    if (!videoId) {
      throw new Error('Invalid video URL');
    }
    return videoId;
  }

  parseDuration(isoDuration: string): number {
    const match = isoDuration.match(/PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/);
    if (!match) return 0;

    const hours = parseInt(match[1] || '0', 10);
    const minutes = parseInt(match[2] || '0', 10);
    const seconds = parseInt(match[3] || '0', 10);

    return hours * 3600 + minutes * 60 + seconds;
  }

  async getVideo(videoId: string): Promise<VideoInfo> {
    const response = await this.youtube.videos.list({
      part: ['snippet', 'contentDetails'],
      id: [videoId],
    });

    const video = response.data.items?.find((item) => item.id === videoId);
    if (!video) {
      throw new Error(`Video not found: ${videoId}`);
    }

    const duration = video.contentDetails?.duration || 'PT0S';
    return {
      videoId,
      url: `https://www.youtube.com/watch?v=${videoId}`,
      title: video.snippet?.title || '',
      description: video.snippet?.description || '',
      channelTitle: video.snippet?.channelTitle || '',
      publishedAt: video.snippet?.publishedAt || '',
      duration,
      durationSeconds: this.parseDuration(duration),
    };
  }

  private async randomDelay(): Promise<void> {
    const { min, max } = this.captionDelayMs;
    const delay = min + Math.random() * (max - min);
    return new Promise((resolve) => setTimeout(resolve, delay));
  }

  async getCaptions(videoId: string, preferredLanguages: string[] = ['en']): Promise<CaptionResult> {
    try {
      const response = await this.youtube.captions.list({
        part: ['snippet'],
        videoId,
      });

      const captionTracks = response.data.items;

      if (!captionTracks || captionTracks.length === 0) {
        return { available: false, isManual: false, caption: null, text: null };
      }

      const parsedTracks: CaptionInfo[] = captionTracks.map((track) => {
        const kind = track.snippet?.trackKind?.toLowerCase();
        const isAsr = kind === 'asr';
        return {
          id: track.id || '',
          videoId,
          language: track.snippet?.name || track.snippet?.language || '',
          languageCode: track.snippet?.language || '',
          trackKind: isAsr ? 'ASR' : kind === 'forced' ? 'forced' : 'standard',
          isAutoGenerated: isAsr,
        };
      });

      // Priority: manual caption in preferred language > manual in any language > none (ASR is left to transcription)
      let selectedCaption: CaptionInfo | null = null;

      for (const lang of preferredLanguages) {
        const manual = parsedTracks.find(
          (t) => !t.isAutoGenerated && t.languageCode.startsWith(lang)
        );
        if (manual) {
          selectedCaption = manual;
          break;
        }
      }

      if (!selectedCaption) {
        selectedCaption = parsedTracks.find((t) => !t.isAutoGenerated) || null;
      }

      if (!selectedCaption) {
        return {
          available: true,
          isManual: false,
          caption: parsedTracks[0] || null,
          text: null,
        };
      }

      await this.randomDelay();
      const captionText = await this.downloadCaptionByLanguage(videoId, selectedCaption.languageCode);

      return {
        available: true,
        isManual: true,
        caption: selectedCaption,
        text: captionText,
      };
    } catch (error) {
      this.onWarning?.(`Failed to fetch captions for ${videoId}: ${error instanceof Error ? error.message : String(error)}`);
      return { available: false, isManual: false, caption: null, text: null };
    }
  }

  private async downloadCaptionByLanguage(videoId: string, lang: string): Promise<string | null> {
    try {
      const url = `https://www.youtube.com/api/timedtext?v=${encodeURIComponent(videoId)}&lang=${encodeURIComponent(lang)}&fmt=json3`;

      const response = await fetch(url, {
        headers: {
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
      });

      if (!response.ok) {
        return null;
      }

      const data = (await response.json()) as {
        events?: Array<{
          segs?: Array<{ utf8?: string }>;
        }>;
      };

      return this.joinCaptionEvents(data.events || []);
    } catch (error) {
      this.onWarning?.(`Failed to download caption: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  /** Flattens json3 caption events into plain transcript text. */
  joinCaptionEvents(events: Array<{ segs?: Array<{ utf8?: string }> }>): string | null {
    const segments: string[] = [];
    for (const event of events) {
      if (!event.segs) continue;
      const text = event.segs
        .map((seg) => seg.utf8 ?? '')
        .join('')
        .replace(/\s+/g, ' ')
        .trim();
      if (text) segments.push(text);
    }

    return segments.length > 0 ? segments.join(' ') : null;
  }
}
