export {
  YtDlpAudioDownloader,
  runCommand,
  audioMimeType,
  type CommandRunner,
  type CommandResult,
  type YtDlpAudioDownloaderOptions,
} from './downloader.js';
