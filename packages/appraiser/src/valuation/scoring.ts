import type { FactorSet, LexicalSignals, ValuationInput, ValuationTables } from './types'
import { analyzeName, codePointLength } from './lexer'

const VOWELS = 'aeiou'
const LETTER = /^\p{L}$/u

// coarse staircase: each tier is a resale price band
export const calculateLengthScore = (length: number): number => {
  if (length <= 3) return 10.0
  if (length <= 5) return 8.0
  if (length <= 7) return 6.0
  if (length <= 10) return 4.0
  if (length <= 15) return 2.0
  return 1.0
}

export const calculateCharacterScore = (signals: LexicalSignals): number => {
  let score = 5.0
  if (signals.hasDigits) score -= 2.0
  if (signals.hasHyphen) score -= 1.5
  if (signals.allLetters) score += 1.0
  if (signals.mixedCase) score -= 0.5
  return Math.max(0, score)
}

const isCompoundBrand = (lower: string, tables: ValuationTables): boolean => {
  const length = codePointLength(lower)
  if (length < 6) return false
  const fits = (affix: string) => length > affix.length + 2
  return (
    tables.brandPrefixes.some((prefix) => lower.startsWith(prefix) && fits(prefix)) ||
    tables.brandSuffixes.some((suffix) => lower.endsWith(suffix) && fits(suffix))
  )
}

/**
 * Keyword value of a name.
 *
 * +3 for every premium word the name contains, +2 when the whole name is a dictionary word,
 * +1 for a compound like `webhub` built on a known brand affix. The bonuses stack.
 */
export const calculateWordScore = (name: string, tables: ValuationTables): number => {
  const lower = name.toLowerCase()
  let score = 0.0

  for (const word of tables.premiumWords) {
    if (lower.includes(word)) score += 3.0
  }
  if (tables.dictionaryWords.has(lower)) score += 2.0
  if (isCompoundBrand(lower, tables)) score += 1.0

  return score
}

export const calculateSuffixScore = (suffix: string, tables: ValuationTables): number => {
  const premium = tables.suffixPremiums.get(suffix)
  return premium === undefined ? 1.0 : premium * 5.0
}

export const isPronounceable = (name: string): boolean => {
  let vowels = 0
  let consonants = 0

  for (const ch of name.toLowerCase()) {
    if (VOWELS.includes(ch)) vowels++
    else if (LETTER.test(ch)) consonants++
  }

  if (vowels === 0) return false
  const ratio = consonants / vowels
  return ratio >= 0.5 && ratio <= 4.0
}

export const isBrandable = (name: string, signals: LexicalSignals = analyzeName(name)): boolean =>
  signals.length >= 3 &&
  signals.length <= 12 &&
  !signals.hasDigits &&
  !signals.hasHyphen &&
  isPronounceable(name)

export const computeFactors = (input: ValuationInput, tables: ValuationTables): FactorSet => {
  const signals = analyzeName(input.name)
  return {
    length: signals.length,
    lengthScore: calculateLengthScore(signals.length),
    characterScore: calculateCharacterScore(signals),
    wordScore: calculateWordScore(input.name, tables),
    suffixScore: calculateSuffixScore(input.suffix, tables),
    pronounceable: isPronounceable(input.name),
    brandable: isBrandable(input.name, signals),
    hasDigits: signals.hasDigits,
    hasHyphen: signals.hasHyphen,
  }
}
