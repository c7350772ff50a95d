import type { FactorSet, ValuationResult, ValuationTables } from './types'
import type { TokenizationContext } from '../types'
import { DEFAULT_TABLES } from './tables'
import { isDegraded, splitDomain } from './lexer'
import { computeFactors } from './scoring'
import { MIN_VALUE, calculateValue, determineConfidence } from './aggregator'
import { INVALID_REASONING, appendClauses, describeTokenization, generateReasoning } from './explainer'

const EMPTY_FACTORS: FactorSet = Object.freeze({
  length: 0,
  lengthScore: 0,
  characterScore: 0,
  wordScore: 0,
  suffixScore: 0,
  pronounceable: false,
  brandable: false,
  hasDigits: false,
  hasHyphen: false,
})

/**
 * Stateless domain valuation. The tables are fixed at construction, so one engine can serve any
 * number of concurrent callers.
 */
export class ValuationEngine {
  readonly tables: ValuationTables

  constructor(tables: ValuationTables = DEFAULT_TABLES) {
    this.tables = tables
  }

  evaluate = (domain: string, context?: TokenizationContext): ValuationResult => {
    const input = splitDomain(domain)

    if (isDegraded(input)) {
      const degraded: ValuationResult = {
        estimatedValue: MIN_VALUE,
        currency: 'USD',
        confidence: 'low',
        factors: EMPTY_FACTORS,
        reasoning: INVALID_REASONING,
      }
      return Object.freeze(degraded)
    }

    const factors = Object.freeze(computeFactors(input, this.tables))
    const reasoning = generateReasoning(factors)

    const result: ValuationResult = {
      estimatedValue: calculateValue(factors),
      currency: 'USD',
      confidence: determineConfidence(factors),
      factors,
      reasoning: context ? appendClauses(reasoning, describeTokenization(context)) : reasoning,
    }
    return Object.freeze(result)
  }
}
