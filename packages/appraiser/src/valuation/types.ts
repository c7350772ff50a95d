export type Confidence = 'low' | 'medium' | 'high'

export interface ValuationInput {
  readonly name: string
  readonly suffix: string
}

export interface LexicalSignals {
  readonly length: number
  readonly hasDigits: boolean
  readonly hasHyphen: boolean
  readonly allLetters: boolean
  readonly mixedCase: boolean
}

export interface FactorSet {
  readonly length: number
  readonly lengthScore: number
  readonly characterScore: number
  readonly wordScore: number
  readonly suffixScore: number
  readonly pronounceable: boolean
  readonly brandable: boolean
  readonly hasDigits: boolean
  readonly hasHyphen: boolean
}

export interface ValuationResult {
  readonly estimatedValue: number
  readonly currency: 'USD'
  readonly confidence: Confidence
  readonly factors: FactorSet
  readonly reasoning: string
}

/** Read-only lookup data the scoring model consults. */
export interface ValuationTables {
  readonly premiumWords: readonly string[]
  readonly dictionaryWords: ReadonlySet<string>
  readonly brandPrefixes: readonly string[]
  readonly brandSuffixes: readonly string[]
  readonly suffixPremiums: ReadonlyMap<string, number>
}
