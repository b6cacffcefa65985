/**
 * Media stream and job types shared by the download engine.
 *
 * Stream metadata comes from the extractor layer and is read-only here.
 */

export type VideoCodec = 'avc' | 'hevc' | 'av1';
export type AudioCodec = 'mp4a' | 'fLaC' | 'ec-3';

export const VIDEO_CODECS: readonly VideoCodec[] = ['avc', 'hevc', 'av1'];
export const AUDIO_CODECS: readonly AudioCodec[] = ['mp4a', 'fLaC', 'ec-3'];

export interface HasCodec<C extends string = string> {
  readonly codec: C;
}

export interface HasQuality {
  readonly quality: number;
}

export interface HasSources {
  readonly url: string;
  readonly mirrors: readonly string[];
}

export interface VideoStreamMeta extends HasCodec<VideoCodec>, HasQuality, HasSources {
  readonly kind: 'video';
  readonly width: number;
  readonly height: number;
}

export interface AudioStreamMeta extends HasCodec<AudioCodec>, HasQuality, HasSources {
  readonly kind: 'audio';
}

export type StreamMeta = VideoStreamMeta | AudioStreamMeta;

/**
 * A contiguous byte range to fetch in one request.
 * `size: null` means "read until the connection closes".
 */
export interface Block {
  start: number;
  size: number | null;
}

export interface DownloadOptions {
  numWorkers: number;
  blockSize: number | null;
  overwrite: boolean;
  videoQuality: number;
  audioQuality: number;
  videoDownloadCodec: VideoCodec;
  audioDownloadCodec: AudioCodec;
  videoSaveCodec: string;
  audioSaveCodec: string;
  outputFormat: string;
  outputFormatAudioOnly: string;
  requireVideo: boolean;
  requireAudio: boolean;
  progressIntervalMs: number;
}

/**
 * Sidecar payloads (subtitles, danmaku, description file).
 * Opaque to the engine; handed to an EpisodeAssetWriter as-is.
 */
export interface EpisodeAssets {
  subtitles?: unknown[];
  danmaku?: unknown;
  description?: unknown;
}

export interface EpisodeJob {
  filename: string;
  outputDir: string;
  tmpDir: string;
  videos: VideoStreamMeta[];
  audios: AudioStreamMeta[];
  assets?: EpisodeAssets;
}

/**
 * Writes sidecar files next to the final output.
 * Implemented by the collaborator layer.
 */
export interface EpisodeAssetWriter {
  write(
    assets: EpisodeAssets,
    context: { outputPath: string; video: VideoStreamMeta | null }
  ): Promise<void>;
}

export enum OrchestratorState {
  SELECTING = 'selecting',
  SKIPPED = 'skipped',
  NOTHING_TO_DO = 'nothing_to_do',
  DOWNLOADING = 'downloading',
  MERGING = 'merging',
  DONE = 'done',
  FAILED = 'failed',
}

export type EpisodeOutcome =
  | { state: OrchestratorState.DONE; outputPath: string }
  | { state: OrchestratorState.SKIPPED; outputPath: string }
  | { state: OrchestratorState.NOTHING_TO_DO };

export interface ProgressSnapshot {
  bytesDone: number;
  bytesTotal: number;
  bytesPerSecond: number;
  complete: boolean;
}
