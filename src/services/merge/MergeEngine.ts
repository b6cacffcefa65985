/**
 * MergeEngine
 *
 * Multiplexes the downloaded elementary streams into the final container with ffmpeg.
 * Arguments are passed as an array (execFile), never through a shell.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import * as os from 'os';
import fs from 'fs-extra';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { checkBinary } from '../../utils/binaryCheck.js';
import { DependencyError, MuxerError } from '../../errors/index.js';
import type { AudioStreamMeta, VideoStreamMeta } from '../../types/media.js';

const execFilePromise = promisify(execFile);

/** Tag that makes HEVC in MP4/MOV playable on Apple devices */
export const APPLE_HEVC_TAG = 'hvc1';

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (file: string, args: string[]) => Promise<ProcessResult>;

const defaultRunner: ProcessRunner = async (file, args) => {
  const { stdout, stderr } = await execFilePromise(file, args, {
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

export interface MergeInput {
  path: string;
  kind: 'video' | 'audio';
  /** 'copy' or an encoder name */
  codec: string;
  /** Container tag, only set for video */
  tag: string | null;
}

export interface MergeSpec {
  inputs: MergeInput[];
  outputPath: string;
  args: string[];
}

export interface MergeRequest {
  video: VideoStreamMeta | null;
  videoPath: string;
  audio: AudioStreamMeta | null;
  audioPath: string;
  videoSaveCodec: string;
  audioSaveCodec: string;
  outputPath: string;
  /** 0 = one per CPU */
  threads?: number;
}

/**
 * Build the muxer arguments.
 *
 * - A save codec equal to the source codec becomes 'copy' (no re-encode).
 * - A video track copied from an HEVC source gets the hvc1 tag.
 */
export function buildMergeSpec(request: MergeRequest): MergeSpec {
  const inputs: MergeInput[] = [];

  if (request.video !== null) {
    const codec = request.video.codec === request.videoSaveCodec ? 'copy' : request.videoSaveCodec;
    const tag = codec === 'copy' && request.video.codec === 'hevc' ? APPLE_HEVC_TAG : null;
    inputs.push({ path: request.videoPath, kind: 'video', codec, tag });
  }

  if (request.audio !== null) {
    const codec = request.audio.codec === request.audioSaveCodec ? 'copy' : request.audioSaveCodec;
    inputs.push({ path: request.audioPath, kind: 'audio', codec, tag: null });
  }

  const videoInput = inputs.find(input => input.kind === 'video');
  const audioInput = inputs.find(input => input.kind === 'audio');
  const threads = request.threads && request.threads > 0 ? request.threads : os.cpus().length;

  const args: string[] = [
    ...inputs.flatMap(input => ['-i', input.path]),
    ...(videoInput ? ['-vcodec', videoInput.codec] : []),
    ...(audioInput ? ['-acodec', audioInput.codec] : []),
    '-strict',
    'unofficial',
    ...(videoInput?.tag ? ['-tag:v', videoInput.tag] : []),
    '-threads',
    String(threads),
    '-y',
    request.outputPath,
  ];

  return { inputs, outputPath: request.outputPath, args };
}

export interface MergeEngineOptions {
  ffmpegPath?: string;
  threads?: number;
  runner?: ProcessRunner;
}

export class MergeEngine {
  private readonly ffmpegPath: string;
  private readonly threads: number;
  private readonly runner: ProcessRunner;

  constructor(options: MergeEngineOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.threads = options.threads ?? 0;
    this.runner = options.runner ?? defaultRunner;
  }

  /**
   * Fail early when ffmpeg cannot be executed
   */
  async checkAvailable(): Promise<string> {
    const result = await checkBinary(this.ffmpegPath, ['-version']);
    if (!result.available) {
      throw new DependencyError(
        this.ffmpegPath,
        `ffmpeg is required to merge streams: ${result.error ?? 'not found'}`
      );
    }
    return result.version ?? 'unknown';
  }

  /**
   * Run the muxer once. Inputs are deleted only after a successful run;
   * on failure they stay for inspection or a later retry.
   */
  async merge(request: MergeRequest): Promise<MergeSpec> {
    const spec = buildMergeSpec({ ...request, threads: request.threads ?? this.threads });

    if (spec.inputs.length === 0) {
      throw new MuxerError(-1, '', 'Nothing to merge: no video or audio input', {
        service: 'MergeEngine',
        operation: 'merge',
      });
    }

    logger.info('[MergeEngine] Merging streams', {
      outputPath: spec.outputPath,
      inputs: spec.inputs.map(input => ({ kind: input.kind, codec: input.codec })),
    });
    logger.debug('[MergeEngine] ffmpeg arguments', { args: spec.args });

    const startTime = Date.now();
    try {
      await this.runner(this.ffmpegPath, spec.args);
    } catch (error) {
      const stderr = readStderr(error);
      const exitCode = readExitCode(error);

      logger.error('[MergeEngine] ffmpeg failed', {
        outputPath: spec.outputPath,
        exitCode,
        error: getErrorMessage(error),
      });

      throw new MuxerError(
        exitCode,
        stderr,
        `ffmpeg exited with code ${exitCode}: ${lastLine(stderr) || getErrorMessage(error)}`,
        { service: 'MergeEngine', operation: 'merge', metadata: { outputPath: spec.outputPath } },
        toError(error)
      );
    }

    await Promise.all(spec.inputs.map(input => fs.remove(input.path)));

    logger.info('[MergeEngine] Merge complete', {
      outputPath: spec.outputPath,
      timeMs: Date.now() - startTime,
    });

    return spec;
  }
}

function readStderr(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string') return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8');
  }
  return '';
}

function readExitCode(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number') return code;
  }
  return -1;
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? '';
}
