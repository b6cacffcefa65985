import dotenv from 'dotenv';
import { AppConfig, DownloadConfig, HttpConfig, MuxerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';
import { AUDIO_CODECS, VIDEO_CODECS } from '../types/media.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment
   */
  static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Download configuration
    config.download.numWorkers = this.getNumber('NUM_WORKERS', config.download.numWorkers);
    config.download.blockSize = this.getBlockSize('BLOCK_SIZE', config.download.blockSize);
    config.download.overwrite = this.getBoolean('OVERWRITE', config.download.overwrite);
    config.download.videoQuality = this.getNumber('VIDEO_QUALITY', config.download.videoQuality);
    config.download.audioQuality = this.getNumber('AUDIO_QUALITY', config.download.audioQuality);
    config.download.videoDownloadCodec = this.getEnum(
      'VIDEO_DOWNLOAD_CODEC',
      config.download.videoDownloadCodec,
      [...VIDEO_CODECS]
    );
    config.download.audioDownloadCodec = this.getEnum(
      'AUDIO_DOWNLOAD_CODEC',
      config.download.audioDownloadCodec,
      [...AUDIO_CODECS]
    );
    config.download.videoSaveCodec = this.getString('VIDEO_SAVE_CODEC', config.download.videoSaveCodec);
    config.download.audioSaveCodec = this.getString('AUDIO_SAVE_CODEC', config.download.audioSaveCodec);
    config.download.outputFormat = this.getString('OUTPUT_FORMAT', config.download.outputFormat);
    config.download.outputFormatAudioOnly = this.getString(
      'OUTPUT_FORMAT_AUDIO_ONLY',
      config.download.outputFormatAudioOnly
    );
    config.download.requireVideo = this.getBoolean('REQUIRE_VIDEO', config.download.requireVideo);
    config.download.requireAudio = this.getBoolean('REQUIRE_AUDIO', config.download.requireAudio);
    config.download.progressIntervalMs = this.getNumber(
      'PROGRESS_INTERVAL_MS',
      config.download.progressIntervalMs
    );

    // Network configuration
    config.http.timeoutMs = this.getNumber('HTTP_TIMEOUT_MS', config.http.timeoutMs);
    config.http.userAgent = this.getString('HTTP_USER_AGENT', config.http.userAgent);
    config.http.referer = process.env.HTTP_REFERER || undefined;
    config.http.maxAttempts = this.getNumber('FETCH_MAX_ATTEMPTS', config.http.maxAttempts);

    // Muxer configuration
    config.muxer.ffmpegPath = this.getString('FFMPEG_PATH', config.muxer.ffmpegPath);
    config.muxer.threads = this.getNumber('MUXER_THREADS', config.muxer.threads);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * BLOCK_SIZE accepts a byte count; "0" or "none" disables chunking
   */
  private getBlockSize(key: string, defaultValue: number | null): number | null {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    if (value.toLowerCase() === 'none') {
      return null;
    }
    const parsed = this.getNumber(key, 0);
    return parsed === 0 ? null : parsed;
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDownloadConfig(): DownloadConfig {
    return this.config.download;
  }

  getHttpConfig(): HttpConfig {
    return this.config.http;
  }

  getMuxerConfig(): MuxerConfig {
    return this.config.muxer;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (this.config.download.numWorkers < 1) {
      errors.push('NUM_WORKERS must be at least 1');
    }
    if (this.config.download.blockSize !== null && this.config.download.blockSize < 1) {
      errors.push('BLOCK_SIZE must be positive, 0 or "none"');
    }
    if (this.config.http.maxAttempts < 1) {
      errors.push('FETCH_MAX_ATTEMPTS must be at least 1');
    }
    if (this.config.download.progressIntervalMs < 1) {
      errors.push('PROGRESS_INTERVAL_MS must be at least 1');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'download',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }
}
