export { ValuationEngine } from './engine'
export { DEFAULT_TABLES, createTables } from './tables'
export { splitDomain, analyzeName, isDegraded } from './lexer'
export {
  calculateLengthScore,
  calculateCharacterScore,
  calculateWordScore,
  calculateSuffixScore,
  isPronounceable,
  isBrandable,
  computeFactors,
} from './scoring'
export { calculateValue, determineConfidence, confidencePoints, MIN_VALUE, MAX_VALUE } from './aggregator'
export { generateReasoning, describeTokenization } from './explainer'
export type {
  Confidence,
  FactorSet,
  LexicalSignals,
  ValuationInput,
  ValuationResult,
  ValuationTables,
} from './types'
