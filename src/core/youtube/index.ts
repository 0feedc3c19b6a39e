export { YouTubeClient, type YouTubeClientOptions } from './client.js';
export { YouTubeResolver, type YouTubeResolverOptions } from './resolver.js';
export { parseVideoId, videoIdFromInput } from './parse-url.js';
