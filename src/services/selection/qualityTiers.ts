import type { AudioCodec, VideoCodec } from '../../types/media.js';

export interface QualityTier {
  id: number;
  description: string;
}

/**
 * Video tiers, best first
 */
export const VIDEO_QUALITY_TIERS: readonly QualityTier[] = [
  { id: 127, description: '8K' },
  { id: 126, description: 'Dolby Vision' },
  { id: 125, description: 'HDR' },
  { id: 120, description: '4K' },
  { id: 116, description: '1080P60' },
  { id: 112, description: '1080P+' },
  { id: 100, description: 'AI 1080P' },
  { id: 80, description: '1080P' },
  { id: 74, description: '720P60' },
  { id: 64, description: '720P' },
  { id: 32, description: '480P' },
  { id: 16, description: '360P' },
];

/**
 * Audio tiers, best first
 */
export const AUDIO_QUALITY_TIERS: readonly QualityTier[] = [
  { id: 30251, description: 'Hi-Res' },
  { id: 30250, description: 'Dolby Atmos' },
  { id: 30280, description: '320kbps' },
  { id: 30232, description: '128kbps' },
  { id: 30216, description: '64kbps' },
];

export const DEFAULT_VIDEO_CODEC_ORDER: readonly VideoCodec[] = ['hevc', 'avc', 'av1'];
export const DEFAULT_AUDIO_CODEC_ORDER: readonly AudioCodec[] = ['fLaC', 'ec-3', 'mp4a'];

/**
 * Position of a tier in its table (0 = best), or null for ids the table does not know
 */
export function tierRank(tiers: readonly QualityTier[], id: number): number | null {
  const index = tiers.findIndex(tier => tier.id === id);
  return index === -1 ? null : index;
}

export function describeTier(tiers: readonly QualityTier[], id: number): string {
  return tiers.find(tier => tier.id === id)?.description ?? String(id);
}
