const YOUTUBE_HOSTS = new Set(['youtube.com', 'm.youtube.com', 'music.youtube.com', 'youtube-nocookie.com']);

const VIDEO_ID = /^[a-zA-Z0-9_-]+$/;
const PATH_VIDEO_ID = /^\/(?:embed|shorts|live|v)\/([a-zA-Z0-9_-]+)/;
const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Extracts the video id from a YouTube link:
 *  - youtube.com/watch?v=ID
 *  - youtu.be/ID
 *  - youtube.com/embed/ID, /shorts/ID, /live/ID
 *
 * Returns null for any other host.
 */
export function parseVideoId(url: string): string | null {
  const trimmed = url.trim();

  let parsed: URL;
  try {
    parsed = new URL(HAS_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return null;
  const host = parsed.hostname.toLowerCase().replace(/^www\./, '');

  if (host === 'youtu.be') {
    const id = parsed.pathname.slice(1).split('/')[0];
    return VIDEO_ID.test(id) ? id : null;
  }

  if (!YOUTUBE_HOSTS.has(host)) return null;

  const v = parsed.searchParams.get('v');
  if (v && VIDEO_ID.test(v)) return v;

  const match = parsed.pathname.match(PATH_VIDEO_ID);
  return match ? match[1] : null;
}

/** Accepts a URL or an already bare 11-character video id. */
export function videoIdFromInput(input: string): string | null {
  const trimmed = input.trim();
  if (BARE_VIDEO_ID.test(trimmed)) return trimmed;
  return parseVideoId(trimmed);
}
