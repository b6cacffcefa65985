/**
 * StreamSelector
 *
 * Picks one video and one audio stream from the candidates of an episode.
 *
 * Selection rules:
 * 1. Quality tiers are tried from the requested one downwards. A tier above
 *    the request is never chosen, even when nothing at or below it exists.
 * 2. Within a tier, the codec that appears earliest in the preference order wins.
 * 3. Remaining ties keep the candidates' original order.
 */

import { logger } from '../../utils/logging.js';
import type {
  AudioCodec,
  AudioStreamMeta,
  HasCodec,
  HasQuality,
  VideoCodec,
  VideoStreamMeta,
} from '../../types/media.js';
import {
  AUDIO_QUALITY_TIERS,
  DEFAULT_AUDIO_CODEC_ORDER,
  DEFAULT_VIDEO_CODEC_ORDER,
  VIDEO_QUALITY_TIERS,
  describeTier,
  tierRank,
  type QualityTier,
} from './qualityTiers.js';

/**
 * Preferred codec first, then the remaining defaults in their usual order
 */
export function codecPriority<C extends string>(preferred: C, defaults: readonly C[]): C[] {
  return [preferred, ...defaults.filter(codec => codec !== preferred)];
}

/**
 * Tier ids to try for a request: the request itself, then every lower available
 * tier, best first. Order comes from the tier table; when the table does not
 * know the requested id, ids are compared numerically.
 */
export function qualityPriority(
  requested: number,
  available: readonly number[],
  tiers: readonly QualityTier[]
): number[] {
  const distinct = Array.from(new Set(available));
  const requestedRank = tierRank(tiers, requested);

  if (requestedRank === null) {
    return distinct.filter(quality => quality <= requested).sort((a, b) => b - a);
  }

  const ranked: Array<{ id: number; rank: number }> = [];
  for (const id of distinct) {
    const rank = tierRank(tiers, id);
    if (rank !== null && rank >= requestedRank) {
      ranked.push({ id, rank });
    }
  }
  return ranked.sort((a, b) => a.rank - b.rank).map(entry => entry.id);
}

function selectStream<T extends HasCodec & HasQuality>(
  candidates: readonly T[],
  quality: number,
  codecPreference: readonly string[],
  tiers: readonly QualityTier[]
): T | null {
  if (candidates.length === 0) {
    return null;
  }

  const codecRank = (codec: string): number => {
    const index = codecPreference.indexOf(codec);
    return index === -1 ? codecPreference.length : index;
  };

  for (const tier of qualityPriority(quality, candidates.map(candidate => candidate.quality), tiers)) {
    let best: T | null = null;
    for (const candidate of candidates) {
      if (candidate.quality !== tier) {
        continue;
      }
      // strict comparison keeps the earlier candidate on ties
      if (best === null || codecRank(candidate.codec) < codecRank(best.codec)) {
        best = candidate;
      }
    }
    if (best !== null) {
      return best;
    }
  }

  return null;
}

export class StreamSelector {
  selectVideo(
    candidates: readonly VideoStreamMeta[],
    quality: number,
    codecPreference: readonly VideoCodec[] = DEFAULT_VIDEO_CODEC_ORDER
  ): VideoStreamMeta | null {
    const selected = selectStream(candidates, quality, codecPreference, VIDEO_QUALITY_TIERS);
    if (selected === null && candidates.length > 0) {
      logger.warn('[StreamSelector] No video stream at or below requested quality', {
        requested: quality,
        available: candidates.map(candidate => candidate.quality),
      });
    }
    return selected;
  }

  selectAudio(
    candidates: readonly AudioStreamMeta[],
    quality: number,
    codecPreference: readonly AudioCodec[] = DEFAULT_AUDIO_CODEC_ORDER
  ): AudioStreamMeta | null {
    const selected = selectStream(candidates, quality, codecPreference, AUDIO_QUALITY_TIERS);
    if (selected === null && candidates.length > 0) {
      logger.warn('[StreamSelector] No audio stream at or below requested quality', {
        requested: quality,
        available: candidates.map(candidate => candidate.quality),
      });
    }
    return selected;
  }
}

function padCenter(text: string, width: number): string {
  const total = Math.max(0, width - text.length);
  const left = Math.floor(total / 2);
  return ' '.repeat(left) + text + ' '.repeat(total - left);
}

function tierLabel(tiers: readonly QualityTier[], id: number): string {
  return padCenter(describeTier(tiers, id), 8);
}

/**
 * Listing lines for the available streams; `*` marks the one that will be downloaded
 */
export function describeStreams(
  videos: readonly VideoStreamMeta[],
  audios: readonly AudioStreamMeta[],
  selectedVideo: VideoStreamMeta | null,
  selectedAudio: AudioStreamMeta | null
): string[] {
  const lines: string[] = [];

  if (videos.length === 0) {
    lines.push('No video streams');
  } else {
    lines.push(`${videos.length} video stream(s):`);
    videos.forEach((video, index) => {
      const marker = video === selectedVideo ? '*' : ' ';
      lines.push(
        `${marker}${String(index).padStart(2)} [${padCenter(video.codec.toUpperCase(), 4)}] ` +
          `[${String(video.width).padStart(4)}x${String(video.height).padEnd(4)}] ` +
          `<${tierLabel(VIDEO_QUALITY_TIERS, video.quality)}> #${video.mirrors.length + 1}`
      );
    });
  }

  if (audios.length === 0) {
    lines.push('No audio streams');
  } else {
    lines.push(`${audios.length} audio stream(s):`);
    audios.forEach((audio, index) => {
      const marker = audio === selectedAudio ? '*' : ' ';
      lines.push(
        `${marker}${String(index).padStart(2)} [${padCenter(audio.codec.toUpperCase(), 4)}] ` +
          `<${tierLabel(AUDIO_QUALITY_TIERS, audio.quality)}>`
      );
    });
  }

  return lines;
}
