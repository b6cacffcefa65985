/**
 * DownloadOrchestrator Tests
 *
 * Whole-episode runs against the in-process transport, real temp files and
 * a runner that stands in for ffmpeg.
 */

import { jest } from '@jest/globals';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { DownloadOrchestrator, roundRobin } from '../../../src/services/download/DownloadOrchestrator.js';
import { RangeFetcher } from '../../../src/services/download/RangeFetcher.js';
import { ConnectionLimiter } from '../../../src/services/download/ConnectionLimiter.js';
import { MergeEngine, type ProcessRunner } from '../../../src/services/merge/MergeEngine.js';
import { ConnectionError, HttpStatusError, MuxerError, StreamDownloadError } from '../../../src/errors/index.js';
import {
  OrchestratorState,
  type DownloadOptions,
  type EpisodeAssetWriter,
  type EpisodeJob,
  type ProgressSnapshot,
} from '../../../src/types/media.js';
import { logger } from '../../../src/utils/logging.js';
import { FakeTransport, byteContent, type FakeSource } from '../../helpers/FakeTransport.js';
import { audio, video } from '../../helpers/streams.js';

jest.mock('../../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const VIDEO_URL = 'https://cdn.test/ep-video.m4s';
const AUDIO_URL = 'https://cdn.test/ep-audio.m4s';

const baseOptions: DownloadOptions = {
  numWorkers: 2,
  blockSize: 100,
  overwrite: false,
  videoQuality: 80,
  audioQuality: 30280,
  videoDownloadCodec: 'avc',
  audioDownloadCodec: 'mp4a',
  videoSaveCodec: 'copy',
  audioSaveCodec: 'copy',
  outputFormat: 'infer',
  outputFormatAudioOnly: 'infer',
  requireVideo: true,
  requireAudio: true,
  progressIntervalMs: 5,
};

describe('roundRobin', () => {
  it('should interleave lists and keep the longer tail in order', () => {
    expect(roundRobin([1, 2, 3, 4], [10, 20])).toEqual([1, 10, 2, 20, 3, 4]);
  });

  it('should handle empty and single lists', () => {
    expect(roundRobin()).toEqual([]);
    expect(roundRobin([], [5, 6])).toEqual([5, 6]);
    expect(roundRobin(['a', 'b'])).toEqual(['a', 'b']);
  });
});

describe('DownloadOrchestrator', () => {
  const videoContent = byteContent(350, 3);
  const audioContent = byteContent(120, 11);

  let root: string;
  let job: EpisodeJob;
  let states: OrchestratorState[];
  let merged: Buffer[];

  // reads every input like ffmpeg would, then writes the output
  const mergingRunner: ProcessRunner = async (_file, args) => {
    const inputs = args.flatMap((arg, index) => (arg === '-i' ? [args[index + 1] ?? ''] : []));
    merged = await Promise.all(inputs.map(input => fs.readFile(input)));
    await fs.writeFile(args[args.length - 1] ?? '', 'muxed');
    return { stdout: '', stderr: '' };
  };

  function setup(
    sources: Record<string, FakeSource> = {
      [VIDEO_URL]: { content: videoContent },
      [AUDIO_URL]: { content: audioContent },
    },
    runner: ProcessRunner = mergingRunner,
    assetWriter?: EpisodeAssetWriter
  ) {
    const transport = new FakeTransport(sources, 32);
    const fetcher = new RangeFetcher({
      transport,
      limiter: new ConnectionLimiter(baseOptions.numWorkers),
      maxAttempts: 1,
    });
    const runnerMock = jest.fn<ProcessRunner>(runner);
    const progress: ProgressSnapshot[] = [];
    const orchestrator = new DownloadOrchestrator({
      fetcher,
      mergeEngine: new MergeEngine({ threads: 1, runner: runnerMock }),
      ...(assetWriter && { assetWriter }),
      onStateChange: state => states.push(state),
      onProgress: snapshot => progress.push(snapshot),
    });
    return { orchestrator, transport, runner: runnerMock, progress };
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mediaweld-job-'));
    states = [];
    merged = [];
    job = {
      filename: 'ep',
      outputDir: path.join(root, 'out'),
      tmpDir: path.join(root, 'tmp'),
      videos: [video(80, 'avc', { url: VIDEO_URL })],
      audios: [audio(30280, 'mp4a', { url: AUDIO_URL })],
    };
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should download both streams, merge them and clean up', async () => {
    const { orchestrator, transport, runner, progress } = setup();

    const outcome = await orchestrator.run(job, baseOptions);

    const outputPath = path.join(root, 'out', 'ep.mp4');
    expect(outcome).toEqual({ state: OrchestratorState.DONE, outputPath });
    expect(states).toEqual([
      OrchestratorState.SELECTING,
      OrchestratorState.DOWNLOADING,
      OrchestratorState.MERGING,
      OrchestratorState.DONE,
    ]);
    expect(transport.sizeRequests).toEqual([VIDEO_URL, AUDIO_URL]);
    expect(transport.requests).toHaveLength(6);
    expect(transport.maxActive).toBeLessThanOrEqual(2);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(merged).toHaveLength(2);
    expect(merged[0]?.equals(videoContent)).toBe(true);
    expect(merged[1]?.equals(audioContent)).toBe(true);
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('muxed');
    expect(await fs.pathExists(job.tmpDir)).toBe(false);
    expect(progress[progress.length - 1]).toEqual({
      bytesDone: 470,
      bytesTotal: 470,
      bytesPerSecond: 0,
      complete: true,
    });
  });

  it('should interleave video and audio blocks at submission', async () => {
    const { orchestrator, transport } = setup();
    const singleWorker = { ...baseOptions, numWorkers: 1 };

    await orchestrator.run(job, singleWorker);

    expect(transport.requests.map(request => request.url)).toEqual([
      VIDEO_URL,
      AUDIO_URL,
      VIDEO_URL,
      AUDIO_URL,
      VIDEO_URL,
      VIDEO_URL,
    ]);
  });

  it('should skip without any network request when the output exists', async () => {
    const outputPath = path.join(job.outputDir, 'ep.mp4');
    await fs.outputFile(outputPath, 'previous run');
    const { orchestrator, transport, runner } = setup();

    const outcome = await orchestrator.run(job, baseOptions);

    expect(outcome).toEqual({ state: OrchestratorState.SKIPPED, outputPath });
    expect(states).toEqual([OrchestratorState.SELECTING, OrchestratorState.SKIPPED]);
    expect(transport.sizeRequests).toEqual([]);
    expect(transport.requests).toEqual([]);
    expect(runner).not.toHaveBeenCalled();
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('previous run');
  });

  it('should replace an existing output when overwrite is set', async () => {
    const outputPath = path.join(job.outputDir, 'ep.mp4');
    await fs.outputFile(outputPath, 'previous run');
    const { orchestrator } = setup();

    const outcome = await orchestrator.run(job, { ...baseOptions, overwrite: true });

    expect(outcome.state).toBe(OrchestratorState.DONE);
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('muxed');
  });

  it('should report nothing to do when no stream is required', async () => {
    const { orchestrator, transport } = setup();

    const outcome = await orchestrator.run(job, {
      ...baseOptions,
      requireVideo: false,
      requireAudio: false,
    });

    expect(outcome).toEqual({ state: OrchestratorState.NOTHING_TO_DO });
    expect(states).toEqual([OrchestratorState.SELECTING, OrchestratorState.NOTHING_TO_DO]);
    expect(transport.requests).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[DownloadOrchestrator] No video or audio stream to download',
      { filename: 'ep' }
    );
  });

  it('should produce an audio-only file when video is not required', async () => {
    const { orchestrator, transport } = setup();

    const outcome = await orchestrator.run(job, { ...baseOptions, requireVideo: false });

    expect(outcome).toEqual({ state: OrchestratorState.DONE, outputPath: path.join(root, 'out', 'ep.aac') });
    expect(transport.sizeRequests).toEqual([AUDIO_URL]);
    expect(merged).toHaveLength(1);
    expect(merged[0]?.equals(audioContent)).toBe(true);
  });

  it('should resume a partial stream from its length', async () => {
    await fs.outputFile(path.join(job.tmpDir, 'ep_video.m4s'), videoContent.subarray(0, 200));
    const { orchestrator, transport } = setup();

    await orchestrator.run(job, baseOptions);

    expect(
      transport.requests.filter(request => request.url === VIDEO_URL).map(request => request.range)
    ).toEqual([
      { start: 200, end: 299 },
      { start: 300, end: 349 },
    ]);
    expect(merged[0]?.equals(videoContent)).toBe(true);
  });

  it('should fetch a stream of unknown size in one request', async () => {
    const { orchestrator, transport } = setup({
      [VIDEO_URL]: { content: videoContent },
      [AUDIO_URL]: { content: audioContent, reportSize: false },
    });

    await orchestrator.run(job, baseOptions);

    expect(
      transport.requests.filter(request => request.url === AUDIO_URL).map(request => request.range)
    ).toEqual([null]);
    expect(merged[1]?.equals(audioContent)).toBe(true);
  });

  it('should write sidecar assets even when the media file is skipped', async () => {
    const outputPath = path.join(job.outputDir, 'ep.mp4');
    await fs.outputFile(outputPath, 'previous run');
    const write = jest.fn<EpisodeAssetWriter['write']>().mockResolvedValue(undefined);
    const { orchestrator } = setup(undefined, mergingRunner, { write });
    const assets = { subtitles: [{ lang: 'en' }] };

    await orchestrator.run({ ...job, assets }, baseOptions);

    expect(write).toHaveBeenCalledWith(assets, { outputPath, video: job.videos[0] });
  });

  it('should fail the job and keep partial files when a stream cannot be fetched', async () => {
    const { orchestrator, runner } = setup({
      [VIDEO_URL]: { content: videoContent },
      [AUDIO_URL]: { content: audioContent, failOpen: new HttpStatusError(500, AUDIO_URL) },
    });

    await expect(orchestrator.run(job, baseOptions)).rejects.toThrow(StreamDownloadError);

    expect(states[states.length - 1]).toBe(OrchestratorState.FAILED);
    expect(states).not.toContain(OrchestratorState.MERGING);
    expect(runner).not.toHaveBeenCalled();
    expect(await fs.pathExists(path.join(job.tmpDir, 'ep_video.m4s'))).toBe(true);
  });

  it('should keep a partial file when no source can report the stream size', async () => {
    const partialPath = path.join(job.tmpDir, 'ep_video.m4s');
    await fs.outputFile(partialPath, videoContent.subarray(0, 200));
    const { orchestrator, transport } = setup({
      [VIDEO_URL]: { content: videoContent, failOpen: new ConnectionError(VIDEO_URL, 'ECONNRESET') },
      [AUDIO_URL]: { content: audioContent },
    });

    await expect(orchestrator.run(job, baseOptions)).rejects.toThrow(StreamDownloadError);

    expect(states[states.length - 1]).toBe(OrchestratorState.FAILED);
    expect(transport.requests).toEqual([]);
    expect((await fs.stat(partialPath)).size).toBe(200);
  });

  it('should cancel in-flight sibling fetches after the first unrecoverable failure', async () => {
    const largeVideo = byteContent(200_000, 5);
    const { orchestrator, transport } = setup({
      [VIDEO_URL]: { content: largeVideo },
      [AUDIO_URL]: { content: audioContent, failAfterBytes: 10 },
    });

    await expect(orchestrator.run(job, { ...baseOptions, blockSize: 50_000 })).rejects.toThrow(
      StreamDownloadError
    );

    const videoRequests = transport.requests.filter(request => request.url === VIDEO_URL);
    expect(transport.active).toBe(0);
    expect(videoRequests.length).toBeLessThan(4);
    expect(await fs.pathExists(path.join(job.tmpDir, 'ep_video.m4s'))).toBe(true);
  });

  it('should fail the job and keep the inputs when the muxer fails', async () => {
    const failure = Object.assign(new Error('Command failed'), { code: 1, stderr: 'Conversion failed!' });
    const { orchestrator } = setup(undefined, async () => {
      throw failure;
    });

    await expect(orchestrator.run(job, baseOptions)).rejects.toThrow(MuxerError);

    expect(states.slice(-2)).toEqual([OrchestratorState.MERGING, OrchestratorState.FAILED]);
    expect(await fs.pathExists(path.join(job.tmpDir, 'ep_video.m4s'))).toBe(true);
    expect(await fs.pathExists(path.join(job.tmpDir, 'ep_audio.m4s'))).toBe(true);
  });
});
