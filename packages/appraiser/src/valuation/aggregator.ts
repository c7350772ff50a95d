import type { Confidence, FactorSet } from './types'
import { clamp } from '../utils'

export const BASE_VALUE = 100
export const MIN_VALUE = 10
export const MAX_VALUE = 1_000_000

const BRANDABLE_BONUS = 1.5
const PRONOUNCEABLE_BONUS = 1.2
const DIGIT_PENALTY = 0.7
const HYPHEN_PENALTY = 0.6

/**
 * Combine the factor scores into a whole-dollar estimate.
 *
 * The word bonus is added after the multiplicative chain, so it is not diluted by (and cannot
 * undo) a zero character or suffix score that precedes it. Keep the step order as is.
 */
export const calculateValue = (factors: FactorSet): number => {
  let multiplier = 1.0
  multiplier *= (factors.lengthScore / 10.0) * 2.0
  multiplier *= factors.characterScore / 5.0
  multiplier *= factors.suffixScore / 5.0
  multiplier += factors.wordScore / 10.0

  if (factors.brandable) multiplier *= BRANDABLE_BONUS
  if (factors.pronounceable) multiplier *= PRONOUNCEABLE_BONUS
  if (factors.hasDigits) multiplier *= DIGIT_PENALTY
  if (factors.hasHyphen) multiplier *= HYPHEN_PENALTY

  return Math.trunc(clamp(BASE_VALUE * multiplier, MIN_VALUE, MAX_VALUE))
}

export const confidencePoints = (factors: FactorSet): number => {
  let points = 0
  if (factors.length <= 5) points += 2
  if (factors.brandable) points += 2
  if (factors.pronounceable) points += 1
  if (factors.suffixScore >= 4.0) points += 2
  if (!factors.hasDigits && !factors.hasHyphen) points += 1
  return points
}

export const determineConfidence = (factors: FactorSet): Confidence => {
  const points = confidencePoints(factors)
  if (points >= 6) return 'high'
  if (points >= 3) return 'medium'
  return 'low'
}
