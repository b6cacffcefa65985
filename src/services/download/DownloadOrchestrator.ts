/**
 * DownloadOrchestrator
 *
 * Runs one episode through selection, download, merge and cleanup.
 *
 *   selecting ─┬─> skipped          (output exists, no overwrite)
 *              ├─> nothing_to_do    (no stream selected)
 *              └─> downloading ──> merging ──> done
 *                        └─────────────┴─────> failed
 *
 * Partial temp files are left on disk after a failure so the next run resumes.
 */

import * as path from 'path';
import fs from 'fs-extra';
import pMap from 'p-map';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { StreamDownloadError } from '../../errors/index.js';
import {
  OrchestratorState,
  type AudioStreamMeta,
  type DownloadOptions,
  type EpisodeAssetWriter,
  type EpisodeJob,
  type EpisodeOutcome,
  type ProgressSnapshot,
  type StreamMeta,
  type VideoStreamMeta,
} from '../../types/media.js';
import { planBlocks } from './blockPlanner.js';
import { ResumableBuffer } from './ResumableBuffer.js';
import { ProgressAggregator, formatProgress } from './ProgressAggregator.js';
import { resolveOutputExtension, tempStreamPaths } from './outputFormat.js';
import type { RangeFetcher } from './RangeFetcher.js';
import type { MergeEngine } from '../merge/MergeEngine.js';
import { StreamSelector, codecPriority, describeStreams } from '../selection/StreamSelector.js';
import { DEFAULT_AUDIO_CODEC_ORDER, DEFAULT_VIDEO_CODEC_ORDER } from '../selection/qualityTiers.js';

type FetchTask = () => Promise<void>;

export interface DownloadOrchestratorDeps {
  fetcher: RangeFetcher;
  mergeEngine: MergeEngine;
  selector?: StreamSelector;
  assetWriter?: EpisodeAssetWriter;
  onStateChange?: (state: OrchestratorState, job: EpisodeJob) => void;
  onProgress?: (snapshot: ProgressSnapshot, job: EpisodeJob) => void;
}

interface ActiveStream {
  meta: StreamMeta;
  urls: string[];
  buffer: ResumableBuffer;
  totalSize: number | null;
}

/**
 * Interleave task lists one element at a time: a0, b0, a1, b1, a2, ...
 * Longer lists keep their tail order once the shorter ones run out.
 */
export function roundRobin<T>(...lists: ReadonlyArray<readonly T[]>): T[] {
  const result: T[] = [];
  const longest = Math.max(0, ...lists.map(list => list.length));
  for (let i = 0; i < longest; i++) {
    for (const list of lists) {
      const item = list[i];
      if (i < list.length && item !== undefined) {
        result.push(item);
      }
    }
  }
  return result;
}

export class DownloadOrchestrator {
  private readonly fetcher: RangeFetcher;
  private readonly mergeEngine: MergeEngine;
  private readonly selector: StreamSelector;
  private readonly assetWriter: EpisodeAssetWriter | undefined;
  private readonly onStateChange: DownloadOrchestratorDeps['onStateChange'];
  private readonly onProgress: DownloadOrchestratorDeps['onProgress'];

  constructor(deps: DownloadOrchestratorDeps) {
    this.fetcher = deps.fetcher;
    this.mergeEngine = deps.mergeEngine;
    this.selector = deps.selector ?? new StreamSelector();
    this.assetWriter = deps.assetWriter;
    this.onStateChange = deps.onStateChange;
    this.onProgress = deps.onProgress;
  }

  async run(job: EpisodeJob, options: DownloadOptions): Promise<EpisodeOutcome> {
    let state = OrchestratorState.SELECTING;
    const enter = (next: OrchestratorState): void => {
      state = next;
      logger.debug('[DownloadOrchestrator] State change', { filename: job.filename, state: next });
      this.onStateChange?.(next, job);
    };

    enter(OrchestratorState.SELECTING);

    try {
      const selectedVideo = this.selector.selectVideo(
        job.videos,
        options.videoQuality,
        codecPriority(options.videoDownloadCodec, DEFAULT_VIDEO_CODEC_ORDER)
      );
      const selectedAudio = this.selector.selectAudio(
        job.audios,
        options.audioQuality,
        codecPriority(options.audioDownloadCodec, DEFAULT_AUDIO_CODEC_ORDER)
      );

      for (const line of describeStreams(job.videos, job.audios, selectedVideo, selectedAudio)) {
        logger.info(line);
      }

      const video = options.requireVideo ? selectedVideo : null;
      const audio = options.requireAudio ? selectedAudio : null;

      const extension = resolveOutputExtension(video, audio, options);
      const outputPath = path.join(job.outputDir, `${job.filename}.${extension}`);

      await fs.ensureDir(job.outputDir);

      // Sidecars are written even when the media file itself is skipped
      if (this.assetWriter && job.assets) {
        await this.assetWriter.write(job.assets, { outputPath, video });
      }

      if (await fs.pathExists(outputPath)) {
        if (!options.overwrite) {
          logger.info('[DownloadOrchestrator] Output already exists, skipping', { outputPath });
          enter(OrchestratorState.SKIPPED);
          return { state: OrchestratorState.SKIPPED, outputPath };
        }
        logger.info('[DownloadOrchestrator] Output exists, overwriting', { outputPath });
        await fs.remove(outputPath);
      }

      if (video === null && audio === null) {
        logger.warn('[DownloadOrchestrator] No video or audio stream to download', {
          filename: job.filename,
        });
        enter(OrchestratorState.NOTHING_TO_DO);
        return { state: OrchestratorState.NOTHING_TO_DO };
      }

      const { videoPath, audioPath } = tempStreamPaths(job.tmpDir, job.filename);

      enter(OrchestratorState.DOWNLOADING);
      await this.download(job, options, [
        ...(video ? [{ meta: video, filePath: videoPath }] : []),
        ...(audio ? [{ meta: audio, filePath: audioPath }] : []),
      ]);

      enter(OrchestratorState.MERGING);
      await this.mergeEngine.merge({
        video,
        videoPath,
        audio,
        audioPath,
        videoSaveCodec: options.videoSaveCodec,
        audioSaveCodec: options.audioSaveCodec,
        outputPath,
      });

      await this.cleanupTempDir(job.tmpDir);

      enter(OrchestratorState.DONE);
      logger.info('[DownloadOrchestrator] Episode complete', { outputPath });
      return { state: OrchestratorState.DONE, outputPath };
    } catch (error) {
      logger.error('[DownloadOrchestrator] Episode failed', {
        filename: job.filename,
        state,
        error: getErrorMessage(error),
      });
      enter(OrchestratorState.FAILED);
      throw error;
    }
  }

  private async download(
    job: EpisodeJob,
    options: DownloadOptions,
    targets: Array<{ meta: VideoStreamMeta | AudioStreamMeta; filePath: string }>
  ): Promise<void> {
    const controller = new AbortController();
    const { signal } = controller;
    const streams: ActiveStream[] = [];

    try {
      for (const target of targets) {
        const urls = [target.meta.url, ...target.meta.mirrors];
        const totalSize = await this.fetcher.getSize(urls, signal);
        // Without a known size or block grid there is no safe resume point
        const fresh = options.overwrite || totalSize === null || options.blockSize === null;
        const buffer = await ResumableBuffer.open(target.filePath, { overwrite: fresh });
        streams.push({ meta: target.meta, urls, buffer, totalSize });
      }

      const taskLists = streams.map(stream =>
        planBlocks(stream.buffer.writtenSize, stream.totalSize, options.blockSize).map(
          (block): FetchTask =>
            () => this.fetcher.fetch(stream.urls, stream.buffer, block.start, block.size, signal)
        )
      );
      const tasks = roundRobin(...taskLists);

      logger.info('[DownloadOrchestrator] Starting download', {
        filename: job.filename,
        blocks: tasks.length,
        workers: options.numWorkers,
        streams: streams.map(stream => ({
          kind: stream.meta.kind,
          totalSize: stream.totalSize,
          resumeFrom: stream.buffer.writtenSize,
        })),
      });

      if (tasks.length > 0) {
        await this.runTasks(job, tasks, streams, options, controller);
      }

      for (const stream of streams) {
        if (stream.totalSize !== null && stream.buffer.writtenSize !== stream.totalSize) {
          throw new StreamDownloadError(
            stream.urls,
            stream.buffer.writtenSize,
            `Incomplete ${stream.meta.kind} stream: ${stream.buffer.writtenSize} of ${stream.totalSize} bytes`,
            { service: 'DownloadOrchestrator', operation: 'download' }
          );
        }
      }
    } finally {
      await Promise.all(streams.map(stream => stream.buffer.close()));
    }
  }

  private async runTasks(
    job: EpisodeJob,
    tasks: FetchTask[],
    streams: ActiveStream[],
    options: DownloadOptions,
    controller: AbortController
  ): Promise<void> {
    const aggregator = new ProgressAggregator(streams);
    const progressController = new AbortController();
    const progressLoop = this.reportProgress(job, aggregator, options.progressIntervalMs, progressController.signal);
    const running = new Set<Promise<void>>();

    try {
      await pMap(
        tasks,
        async task => {
          const pending = task();
          running.add(pending);
          try {
            await pending;
          } catch (error) {
            // first failure cancels every sibling of this job
            controller.abort();
            throw error;
          } finally {
            running.delete(pending);
          }
        },
        { concurrency: options.numWorkers, stopOnError: true }
      );
    } catch (error) {
      // in-flight siblings must settle before the buffers close
      await Promise.allSettled(Array.from(running));
      throw error;
    } finally {
      progressController.abort();
      await progressLoop;
    }

    this.emitProgress(job, aggregator.sample());
  }

  private async reportProgress(
    job: EpisodeJob,
    aggregator: ProgressAggregator,
    intervalMs: number,
    signal: AbortSignal
  ): Promise<void> {
    for await (const snapshot of aggregator.snapshots({ intervalMs, signal })) {
      logger.info(`[DownloadOrchestrator] ${job.filename}: ${formatProgress(snapshot)}`);
      this.emitProgress(job, snapshot);
    }
  }

  private emitProgress(job: EpisodeJob, snapshot: ProgressSnapshot): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(snapshot, job);
    } catch (error) {
      logger.warn('[DownloadOrchestrator] Progress callback failed', { error: getErrorMessage(error) });
    }
  }

  /**
   * The merge step already removed the stream files; drop the directory once empty
   */
  private async cleanupTempDir(tmpDir: string): Promise<void> {
    try {
      if (!(await fs.pathExists(tmpDir))) return;
      const entries = await fs.readdir(tmpDir);
      if (entries.length === 0) {
        await fs.remove(tmpDir);
      }
    } catch (error) {
      logger.warn('[DownloadOrchestrator] Failed to clean up temp directory', {
        tmpDir,
        error: getErrorMessage(error),
      });
    }
  }
}
