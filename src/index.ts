import { ConfigManager } from './config/ConfigManager.js';
import type { AppConfig } from './config/types.js';
import { initializeLogger } from './utils/logging.js';
import { ConnectionLimiter } from './services/download/ConnectionLimiter.js';
import { AxiosTransport, type HttpTransport } from './services/download/HttpTransport.js';
import { RangeFetcher } from './services/download/RangeFetcher.js';
import {
  DownloadOrchestrator,
  type DownloadOrchestratorDeps,
} from './services/download/DownloadOrchestrator.js';
import { MergeEngine, type ProcessRunner } from './services/merge/MergeEngine.js';
import { parseDownloadOptions } from './validation/downloadSchemas.js';
import type { DownloadOptions } from './types/media.js';

export interface CreateDownloaderOptions {
  /** Defaults to the environment-driven ConfigManager configuration */
  config?: AppConfig;
  transport?: HttpTransport;
  runner?: ProcessRunner;
  assetWriter?: DownloadOrchestratorDeps['assetWriter'];
  onStateChange?: DownloadOrchestratorDeps['onStateChange'];
  onProgress?: DownloadOrchestratorDeps['onProgress'];
}

export interface Downloader {
  orchestrator: DownloadOrchestrator;
  mergeEngine: MergeEngine;
  /** Validated download options taken from the configuration */
  options: DownloadOptions;
}

/**
 * Wire one downloader. All jobs run through it share a single connection limiter.
 */
export function createDownloader(overrides: CreateDownloaderOptions = {}): Downloader {
  let config = overrides.config;
  if (!config) {
    const manager = ConfigManager.getInstance();
    manager.validate();
    config = manager.getConfig();
  }
  initializeLogger(config.logging);

  const options = parseDownloadOptions(config.download);
  const limiter = new ConnectionLimiter(options.numWorkers);
  const fetcher = new RangeFetcher({
    transport: overrides.transport ?? new AxiosTransport(config.http),
    limiter,
    maxAttempts: config.http.maxAttempts,
  });
  const mergeEngine = new MergeEngine({
    ffmpegPath: config.muxer.ffmpegPath,
    threads: config.muxer.threads,
    ...(overrides.runner && { runner: overrides.runner }),
  });

  const orchestrator = new DownloadOrchestrator({
    fetcher,
    mergeEngine,
    ...(overrides.assetWriter && { assetWriter: overrides.assetWriter }),
    ...(overrides.onStateChange && { onStateChange: overrides.onStateChange }),
    ...(overrides.onProgress && { onProgress: overrides.onProgress }),
  });

  return { orchestrator, mergeEngine, options };
}

export { ConfigManager } from './config/ConfigManager.js';
export type { AppConfig, DownloadConfig, HttpConfig, MuxerConfig, LoggingConfig } from './config/types.js';
export { logger, initializeLogger } from './utils/logging.js';
export * from './errors/index.js';
export * from './types/media.js';
export { planBlocks } from './services/download/blockPlanner.js';
export { ResumableBuffer, withResumableBuffer } from './services/download/ResumableBuffer.js';
export { ConnectionLimiter } from './services/download/ConnectionLimiter.js';
export {
  AxiosTransport,
  formatRangeHeader,
  parseContentRangeTotal,
  type ByteRange,
  type HttpTransport,
} from './services/download/HttpTransport.js';
export { RangeFetcher, type RangeFetcherOptions } from './services/download/RangeFetcher.js';
export { ProgressAggregator, formatBytes, formatProgress } from './services/download/ProgressAggregator.js';
export { resolveOutputExtension, tempStreamPaths } from './services/download/outputFormat.js';
export { DownloadOrchestrator, roundRobin } from './services/download/DownloadOrchestrator.js';
export {
  MergeEngine,
  buildMergeSpec,
  APPLE_HEVC_TAG,
  type MergeRequest,
  type MergeSpec,
  type ProcessRunner,
} from './services/merge/MergeEngine.js';
export {
  StreamSelector,
  codecPriority,
  qualityPriority,
  describeStreams,
} from './services/selection/StreamSelector.js';
export { VIDEO_QUALITY_TIERS, AUDIO_QUALITY_TIERS } from './services/selection/qualityTiers.js';
export { parseDownloadOptions, parseEpisodeJob } from './validation/downloadSchemas.js';
