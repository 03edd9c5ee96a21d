import type { ThresholdsConfig } from '../config/index.js';
import { averageLuminance, laplacianVariance, type GrayscaleFrame } from '../video/utils.js';

export type QualityRejectReason = 'blur' | 'exposure';

export type QualityEvaluation = {
  accepted: boolean;
  sharpness: number;
  brightness: number;
  reasons: QualityRejectReason[];
};

export type QualityThresholds = Pick<ThresholdsConfig, 'blurThreshold' | 'brightnessMin' | 'brightnessMax'>;

/**
 * Sharpness and exposure run independently; both reasons are reported when both fail.
 */
export function evaluateQuality(frame: GrayscaleFrame, thresholds: QualityThresholds): QualityEvaluation {
  const sharpness = laplacianVariance(frame);
  const brightness = averageLuminance(frame);
  const reasons: QualityRejectReason[] = [];

  if (sharpness < thresholds.blurThreshold) {
    reasons.push('blur');
  }

  if (brightness < thresholds.brightnessMin || brightness > thresholds.brightnessMax) {
    reasons.push('exposure');
  }

  return { accepted: reasons.length === 0, sharpness, brightness, reasons };
}

export function accept(frame: GrayscaleFrame, thresholds: QualityThresholds): boolean {
  return evaluateQuality(frame, thresholds).accepted;
}
