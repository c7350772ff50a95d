import type { ValuationTables } from './types'

const PREMIUM_WORDS = [
  'app', 'web', 'tech', 'crypto', 'blockchain', 'ai', 'ml', 'data',
  'cloud', 'api', 'dev', 'code', 'digital', 'online', 'smart',
  'auto', 'health', 'finance', 'bank', 'pay', 'shop', 'store',
  'game', 'play', 'social', 'network', 'security', 'privacy',
]

const DICTIONARY_WORDS = [
  'app', 'web', 'net', 'tech', 'data', 'info', 'news', 'shop', 'store',
  'game', 'play', 'work', 'home', 'life', 'love', 'time', 'world',
  'best', 'new', 'top', 'first', 'last', 'good', 'great', 'super',
]

const BRAND_PREFIXES = ['web', 'app', 'my', 'get', 'the', 'new', 'top', 'best']

const BRAND_SUFFIXES = ['app', 'web', 'net', 'tech', 'hub', 'lab', 'pro', 'max']

// coefficient in [0, 1]; scaled by 5 when scored
const SUFFIX_PREMIUMS: Record<string, number> = {
  '.com': 1.0,
  '.net': 0.7,
  '.org': 0.6,
  '.io': 0.8,
  '.co': 0.6,
  '.app': 0.7,
  '.dev': 0.6,
  '.tech': 0.5,
  '.eth': 0.9,
  '.crypto': 0.8,
  '.nft': 0.7,
}

export const createTables = (overrides: Partial<ValuationTables> = {}): ValuationTables =>
  Object.freeze({
    premiumWords: Object.freeze([...PREMIUM_WORDS]),
    dictionaryWords: new Set(DICTIONARY_WORDS),
    brandPrefixes: Object.freeze([...BRAND_PREFIXES]),
    brandSuffixes: Object.freeze([...BRAND_SUFFIXES]),
    suffixPremiums: new Map(Object.entries(SUFFIX_PREMIUMS)),
    ...overrides,
  })

export const DEFAULT_TABLES: ValuationTables = createTables()
