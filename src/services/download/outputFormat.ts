import * as path from 'path';
import type { AudioStreamMeta, VideoStreamMeta } from '../../types/media.js';

export interface OutputFormatOptions {
  outputFormat: string;
  outputFormatAudioOnly: string;
}

/**
 * Extension (without dot) of the final file.
 *
 * With video: explicit format, else mkv for FLAC audio (MP4 cannot carry FLAC), else mp4.
 * Audio only: explicit format, else flac for FLAC audio, else aac.
 */
export function resolveOutputExtension(
  video: VideoStreamMeta | null,
  audio: AudioStreamMeta | null,
  options: OutputFormatOptions
): string {
  const flacAudio = audio !== null && audio.codec === 'fLaC';

  if (video === null) {
    if (options.outputFormatAudioOnly !== 'infer') {
      return options.outputFormatAudioOnly;
    }
    // TODO: ec-3 sources also end up as .aac; map them to .eac3
    return flacAudio ? 'flac' : 'aac';
  }

  if (options.outputFormat !== 'infer') {
    return options.outputFormat;
  }
  return flacAudio ? 'mkv' : 'mp4';
}

export interface TempStreamPaths {
  videoPath: string;
  audioPath: string;
}

export function tempStreamPaths(tmpDir: string, filename: string): TempStreamPaths {
  return {
    videoPath: path.join(tmpDir, `${filename}_video.m4s`),
    audioPath: path.join(tmpDir, `${filename}_audio.m4s`),
  };
}
