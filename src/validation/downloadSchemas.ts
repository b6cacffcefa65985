import { z, type ZodType } from 'zod';
import { SchemaValidationError } from '../errors/index.js';
import type { DownloadOptions, EpisodeJob } from '../types/media.js';

/**
 * Download Validation Schemas
 *
 * Zod schemas for options and episode jobs handed to the engine by the caller
 */

export const videoCodecSchema = z.enum(['avc', 'hevc', 'av1']);
export const audioCodecSchema = z.enum(['mp4a', 'fLaC', 'ec-3']);

const formatSchema = z.string()
  .min(1, 'Format is required')
  .regex(/^[a-z0-9]+$/i, 'Format must be "infer" or a bare extension');

export const downloadOptionsSchema = z.object({
  numWorkers: z.number().int().min(1, 'At least one worker is required'),
  blockSize: z.number().int().positive().nullable(),
  overwrite: z.boolean(),
  videoQuality: z.number().int().nonnegative(),
  audioQuality: z.number().int().nonnegative(),
  videoDownloadCodec: videoCodecSchema,
  audioDownloadCodec: audioCodecSchema,
  videoSaveCodec: z.string().min(1),
  audioSaveCodec: z.string().min(1),
  outputFormat: formatSchema,
  outputFormatAudioOnly: formatSchema,
  requireVideo: z.boolean(),
  requireAudio: z.boolean(),
  progressIntervalMs: z.number().int().positive(),
});

const sourcesShape = {
  url: z.string().url('Stream URL must be absolute'),
  mirrors: z.array(z.string().url()).default([]),
  quality: z.number().int().nonnegative(),
};

export const videoStreamSchema = z.object({
  kind: z.literal('video'),
  codec: videoCodecSchema,
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  ...sourcesShape,
});

export const audioStreamSchema = z.object({
  kind: z.literal('audio'),
  codec: audioCodecSchema,
  ...sourcesShape,
});

export const episodeJobSchema = z.object({
  filename: z.string()
    .min(1, 'Filename is required')
    .refine(name => !/[/\\]/.test(name), 'Filename must not contain path separators'),
  outputDir: z.string().min(1, 'Output directory is required'),
  tmpDir: z.string().min(1, 'Temporary directory is required'),
  videos: z.array(videoStreamSchema),
  audios: z.array(audioStreamSchema),
  assets: z.object({
    subtitles: z.array(z.unknown()).optional(),
    danmaku: z.unknown().optional(),
    description: z.unknown().optional(),
  }).optional(),
});

function parseWith<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new SchemaValidationError(errors, `Invalid ${label}: ${errors.length} error(s)`, {
      service: 'validation',
      operation: `parse ${label}`,
    });
  }
  return result.data;
}

export function parseDownloadOptions(input: unknown): DownloadOptions {
  return parseWith(downloadOptionsSchema, input, 'download options');
}

export function parseEpisodeJob(input: unknown): EpisodeJob {
  return parseWith(episodeJobSchema, input, 'episode job');
}
