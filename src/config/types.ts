import type { AudioCodec, VideoCodec } from '../types/media.js';

export interface DownloadConfig {
  numWorkers: number;
  blockSize: number | null; // bytes, null = single block
  overwrite: boolean;
  videoQuality: number;
  audioQuality: number;
  videoDownloadCodec: VideoCodec;
  audioDownloadCodec: AudioCodec;
  videoSaveCodec: string;
  audioSaveCodec: string;
  outputFormat: string; // 'infer' or an extension
  outputFormatAudioOnly: string;
  requireVideo: boolean;
  requireAudio: boolean;
  progressIntervalMs: number;
}

export interface HttpConfig {
  timeoutMs: number;
  userAgent: string;
  referer?: string | undefined;
  maxAttempts: number; // passes over the mirror list per block
}

export interface MuxerConfig {
  ffmpegPath: string;
  threads: number; // 0 = one per CPU
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  download: DownloadConfig;
  http: HttpConfig;
  muxer: MuxerConfig;
  logging: LoggingConfig;
}
