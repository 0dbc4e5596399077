import type { ConfidenceLabel } from '@statetax/types';
import { type ConfidenceThresholds, DEFAULT_CONFIDENCE_THRESHOLDS } from '../../../lib/env.js';

/**
 * Map a 0–100 score to a label. A score must exceed a threshold to reach that band,
 * so 90 is Medium and 70 is Low under the default thresholds.
 */
export function classifyConfidence(
  score: number,
  thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS
): ConfidenceLabel {
  if (score > thresholds.high) return 'High';
  if (score > thresholds.medium) return 'Medium';
  return 'Low';
}

/** Accepts 85, "85", "85%", 0.85 and "high (92%)"; returns a 0–100 score. */
export function parseConfidenceScore(value: unknown): number | undefined {
  let n: number | undefined;
  let percent = false;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string') {
    const m = /(\d+(?:\.\d+)?)\s*(%)?/.exec(value);
    if (m) {
      n = Number(m[1]);
      percent = m[2] === '%';
    }
  }
  if (n === undefined || !Number.isFinite(n) || n < 0) return undefined;
  // fractions (0.85) are read as percentages; 1 stays on the 0–100 scale
  if (!percent && n > 0 && n < 1) n *= 100;
  return Math.min(Math.round(n * 100) / 100, 100);
}

export function confidenceFromWord(value: unknown): ConfidenceLabel | undefined {
  if (typeof value !== 'string') return undefined;
  const word = value.trim().toLowerCase();
  if (word.startsWith('high')) return 'High';
  if (word.startsWith('medium') || word.startsWith('moderate')) return 'Medium';
  if (word.startsWith('low')) return 'Low';
  return undefined;
}

const RANK: Record<ConfidenceLabel, number> = { Low: 0, Medium: 1, High: 2 };

export function capConfidence(label: ConfidenceLabel, ceiling: ConfidenceLabel): ConfidenceLabel {
  return RANK[label] > RANK[ceiling] ? ceiling : label;
}
