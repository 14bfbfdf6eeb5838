/**
 * Scaling Advisor
 *
 * Pure function over the latest health snapshot and trail volume signal.
 * Performs no I/O and keeps no state, so recommendations are reproducible
 * from fixed snapshots.
 *
 * Policy:
 * - scale-up: peak resource in the degraded band [soft, hard) while volume
 *   is rising, or peak resource at or above the hard ceiling
 * - scale-down: peak resource under the idle ceiling while volume stayed
 *   low over a fully observed sustained window
 * - hold: otherwise
 */

import type { ResourceSnapshot } from '../types/health.js';
import type {
  ScalingInput,
  ScalingRecommendation,
  ScalingSignals,
  ScalingThresholds,
} from '../types/scaling.js';
import type { VolumeSignal } from '../types/trails.js';
import { clamp01, safeDivide } from '../utils/math-helpers.js';

export function createDefaultScalingThresholds(): ScalingThresholds {
  return {
    softResourcePercent: 80,
    hardResourcePercent: 95,
    idleResourcePercent: 30,
    risingMargin: 0.2,
    lowVolumePerMinute: 5,
  };
}

type ResourceName = 'cpu' | 'memory' | 'disk';

function peakResource(resources: ResourceSnapshot): { name: ResourceName; percent: number } {
  let peak: { name: ResourceName; percent: number } = { name: 'cpu', percent: resources.cpuPercent };
  if (resources.memoryPercent > peak.percent) {
    peak = { name: 'memory', percent: resources.memoryPercent };
  }
  if (resources.diskPercent > peak.percent) {
    peak = { name: 'disk', percent: resources.diskPercent };
  }
  return peak;
}

export function isVolumeRising(volume: VolumeSignal, risingMargin: number): boolean {
  return volume.recentPerMinute > volume.previousPerMinute * (1 + risingMargin);
}

export function isVolumeLowSustained(volume: VolumeSignal, lowVolumePerMinute: number): boolean {
  return volume.coversSustainedWindow && volume.sustainedPeakPerMinute <= lowVolumePerMinute;
}

/**
 * Growth of the recent rate over the previous one; a doubling scores 1
 */
function growthScore(volume: VolumeSignal): number {
  if (volume.previousPerMinute === 0) {
    return volume.recentPerMinute > 0 ? 1 : 0;
  }
  return clamp01(volume.recentPerMinute / volume.previousPerMinute - 1);
}

/**
 * Recommend a scaling direction
 *
 * Confidence is the mean of the normalized distances of the deciding
 * signals past their thresholds, clamped to [0, 1].
 */
export function recommendScaling(
  input: ScalingInput,
  thresholds: ScalingThresholds = createDefaultScalingThresholds()
): ScalingRecommendation {
  const { softResourcePercent: soft, hardResourcePercent: hard, idleResourcePercent: idle } = thresholds;
  const { resources, status } = input.health;
  const volume = input.volume;

  const volumeRising = isVolumeRising(volume, thresholds.risingMargin);
  const volumeLowSustained = isVolumeLowSustained(volume, thresholds.lowVolumePerMinute);

  if (!resources) {
    return {
      direction: 'hold',
      confidence: 0,
      reasons: ['No resource snapshot available yet'],
      signals: {
        peakResourcePercent: null,
        peakResource: null,
        volumeRising,
        volumeLowSustained,
        healthStatus: status,
      },
    };
  }

  const peak = peakResource(resources);
  const u = peak.percent;
  const signals: ScalingSignals = {
    peakResourcePercent: u,
    peakResource: peak.name,
    volumeRising,
    volumeLowSustained,
    healthStatus: status,
  };
  const usage = `${peak.name} at ${u.toFixed(1)}%`;
  const volumeText = `volume ${volume.recentPerMinute.toFixed(1)}/min vs ${volume.previousPerMinute.toFixed(1)}/min before`;

  if (u >= hard) {
    const reasons = [`${usage} is at or above the critical ceiling ${hard}%`];
    if (volumeRising) {
      reasons.push(`Operation ${volumeText} is rising`);
    }
    return {
      direction: 'scale-up',
      confidence: clamp01(0.5 + 0.5 * safeDivide(u - hard, 100 - hard, 1)),
      reasons,
      signals,
    };
  }

  if (u >= soft) {
    const bandPosition = clamp01(safeDivide(u - soft, hard - soft));

    if (volumeRising) {
      return {
        direction: 'scale-up',
        confidence: clamp01((bandPosition + growthScore(volume)) / 2),
        reasons: [
          `${usage} is in the degraded band [${soft}%, ${hard}%)`,
          `Operation ${volumeText} is rising`,
        ],
        signals,
      };
    }

    return {
      direction: 'hold',
      confidence: clamp01(1 - bandPosition),
      reasons: [`${usage} is in the degraded band but operation volume is not rising`],
      signals,
    };
  }

  if (u < idle && volumeLowSustained) {
    const resourceSlack = safeDivide(idle - u, idle);
    const volumeSlack =
      thresholds.lowVolumePerMinute === 0
        ? 1
        : safeDivide(thresholds.lowVolumePerMinute - volume.sustainedPeakPerMinute, thresholds.lowVolumePerMinute);

    return {
      direction: 'scale-down',
      confidence: clamp01((resourceSlack + volumeSlack) / 2),
      reasons: [
        `${usage} is under the idle ceiling ${idle}%`,
        `Peak operation volume ${volume.sustainedPeakPerMinute.toFixed(1)}/min stayed at or under ${thresholds.lowVolumePerMinute}/min`,
      ],
      signals,
    };
  }

  const reasons = [`${usage} is under the soft ceiling ${soft}%`];
  if (u < idle && !volume.coversSustainedWindow) {
    reasons.push('Sustained volume window not yet fully observed');
  } else if (u < idle) {
    reasons.push(`Peak operation volume ${volume.sustainedPeakPerMinute.toFixed(1)}/min is above ${thresholds.lowVolumePerMinute}/min`);
  }

  return {
    direction: 'hold',
    confidence: clamp01(safeDivide(soft - u, soft)),
    reasons,
    signals,
  };
}
