import type { FactorSet } from './types'
import type { TokenizationContext } from '../types'
import { sol } from '../utils'

export const FALLBACK_REASONING = 'Standard domain name'
export const INVALID_REASONING = 'Invalid domain format'

const SEPARATOR = '; '

const lengthClause = (length: number): string | null => {
  if (length <= 3) return 'Very short domain (premium)'
  if (length <= 5) return 'Short and memorable'
  if (length > 15) return 'Long domain name'
  return null
}

export const reasoningClauses = (factors: FactorSet): string[] => {
  const reasons: string[] = []
  const length = lengthClause(factors.length)
  if (length) reasons.push(length)
  if (factors.brandable) reasons.push('Brandable name')
  if (factors.pronounceable) reasons.push('Easy to pronounce')
  if (factors.wordScore > 2) reasons.push('Contains valuable keywords')
  if (factors.hasDigits) reasons.push('Contains numbers (reduces value)')
  if (factors.hasHyphen) reasons.push('Contains hyphens (reduces value)')
  return reasons
}

export const generateReasoning = (factors: FactorSet): string => {
  const reasons = reasoningClauses(factors)
  return reasons.length > 0 ? reasons.join(SEPARATOR) : FALLBACK_REASONING
}

/** Extra clauses for a tokenized domain. Never feeds back into the estimate. */
export const describeTokenization = (context: TokenizationContext): string[] => {
  if (!context.tokenized) return []

  const clauses: string[] = []
  const chain = context.chain ?? 'an unknown chain'
  clauses.push(context.ticker ? `Tokenized on ${chain} as $${context.ticker}` : `Tokenized on ${chain}`)

  const defi = context.defi
  if (defi?.isCollateral) {
    const platform = defi.lendingPlatform ?? 'a lending platform'
    clauses.push(
      `Used as collateral on ${platform} (${sol(defi.collateralLamports)} SOL locked, ${sol(defi.borrowedLamports)} SOL borrowed)`,
    )
  }
  if (defi?.yieldGeneration) clauses.push('Generating yield')

  return clauses
}

export const appendClauses = (reasoning: string, clauses: string[]): string =>
  clauses.length > 0 ? [reasoning, ...clauses].join(SEPARATOR) : reasoning
