/**
 * ConfigManager Tests
 */

import { ConfigManager } from '../../src/config/ConfigManager.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('ConfigManager', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    ConfigManager.resetInstance();
  });

  afterAll(() => {
    process.env = originalEnv;
    ConfigManager.resetInstance();
  });

  it('should fall back to the defaults', () => {
    const config = ConfigManager.getInstance().getDownloadConfig();

    expect(config).toEqual(defaultConfig.download);
    expect(config).not.toBe(defaultConfig.download);
  });

  it('should return the same instance until reset', () => {
    const first = ConfigManager.getInstance();
    expect(ConfigManager.getInstance()).toBe(first);

    ConfigManager.resetInstance();
    expect(ConfigManager.getInstance()).not.toBe(first);
  });

  it('should read download settings from the environment', () => {
    process.env.NUM_WORKERS = '4';
    process.env.BLOCK_SIZE = '1048576';
    process.env.OVERWRITE = 'true';
    process.env.VIDEO_DOWNLOAD_CODEC = 'hevc';
    process.env.AUDIO_DOWNLOAD_CODEC = 'fLaC';
    process.env.OUTPUT_FORMAT = 'mkv';
    process.env.REQUIRE_AUDIO = '0';

    const config = ConfigManager.getInstance().getDownloadConfig();

    expect(config.numWorkers).toBe(4);
    expect(config.blockSize).toBe(1048576);
    expect(config.overwrite).toBe(true);
    expect(config.videoDownloadCodec).toBe('hevc');
    expect(config.audioDownloadCodec).toBe('fLaC');
    expect(config.outputFormat).toBe('mkv');
    expect(config.requireAudio).toBe(false);
  });

  it('should disable chunking for a block size of 0 or none', () => {
    process.env.BLOCK_SIZE = 'none';
    expect(ConfigManager.getInstance().getDownloadConfig().blockSize).toBeNull();

    ConfigManager.resetInstance();
    process.env.BLOCK_SIZE = '0';
    expect(ConfigManager.getInstance().getDownloadConfig().blockSize).toBeNull();
  });

  it('should read network and muxer settings', () => {
    process.env.HTTP_TIMEOUT_MS = '5000';
    process.env.HTTP_REFERER = 'https://referer.test/';
    process.env.FETCH_MAX_ATTEMPTS = '3';
    process.env.FFMPEG_PATH = '/usr/local/bin/ffmpeg';
    process.env.MUXER_THREADS = '2';

    const manager = ConfigManager.getInstance();

    expect(manager.getHttpConfig()).toEqual({
      timeoutMs: 5000,
      userAgent: defaultConfig.http.userAgent,
      referer: 'https://referer.test/',
      maxAttempts: 3,
    });
    expect(manager.getMuxerConfig()).toEqual({ ffmpegPath: '/usr/local/bin/ffmpeg', threads: 2 });
  });

  it('should reject an unknown codec name', () => {
    process.env.VIDEO_DOWNLOAD_CODEC = 'vp9';

    expect(() => ConfigManager.getInstance()).toThrow(ConfigurationError);
  });

  it('should reject a non-numeric worker count', () => {
    process.env.NUM_WORKERS = 'many';

    expect(() => ConfigManager.getInstance()).toThrow(ConfigurationError);
  });

  it('should pick up environment changes on reload', () => {
    const manager = ConfigManager.getInstance();
    process.env.NUM_WORKERS = '16';

    manager.reload();

    expect(manager.getDownloadConfig().numWorkers).toBe(16);
  });

  describe('validate', () => {
    it('should accept the defaults', () => {
      expect(() => ConfigManager.getInstance().validate()).not.toThrow();
    });

    it('should list every invalid setting', () => {
      process.env.NUM_WORKERS = '0';
      process.env.FETCH_MAX_ATTEMPTS = '0';

      expect(() => ConfigManager.getInstance().validate()).toThrow(
        'Configuration validation failed:\nNUM_WORKERS must be at least 1\nFETCH_MAX_ATTEMPTS must be at least 1'
      );
    });
  });
});
