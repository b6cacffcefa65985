import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  download: {
    numWorkers: 8,
    blockSize: 512 * 1024, // 0.5 MiB
    overwrite: false,
    videoQuality: 127,
    audioQuality: 30251,
    videoDownloadCodec: 'avc',
    audioDownloadCodec: 'mp4a',
    videoSaveCodec: 'copy',
    audioSaveCodec: 'copy',
    outputFormat: 'infer',
    outputFormatAudioOnly: 'infer',
    requireVideo: true,
    requireAudio: true,
    progressIntervalMs: 500,
  },
  http: {
    timeoutMs: 30000,
    userAgent:
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
    maxAttempts: 2,
  },
  muxer: {
    ffmpegPath: 'ffmpeg',
    threads: 0,
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
