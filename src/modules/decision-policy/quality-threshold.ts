/**
 * Minimum QA quality score per iteration.
 *
 * Early iterations are held to a lower bar so the first patches can land;
 * the bar rises in two steps as the run matures.
 */

import type { QualitySettings } from '../config/config-schema.js'
import type { QualityThresholdOptions } from './types.js'

export function minQualityScore(iteration: number, options: QualityThresholdOptions): number {
  if (!options.progressionEnabled) return options.flat
  if (iteration <= options.earlyUntil) return options.initial
  if (iteration <= options.midUntil) return options.mid
  return options.final
}

export function qualityOptionsFromSettings(settings: QualitySettings): QualityThresholdOptions {
  return {
    progressionEnabled: settings.progression_enabled,
    flat: settings.min_quality_score,
    initial: settings.min_quality_score_initial,
    mid: settings.min_quality_score_mid,
    final: settings.min_quality_score_final,
    earlyUntil: settings.early_until,
    midUntil: settings.mid_until,
  }
}
