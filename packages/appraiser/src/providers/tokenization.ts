import { createHash } from 'crypto'
import { Keypair, LAMPORTS_PER_SOL } from '@solana/web3.js'
import type { CrossChainPresence, TokenRecord, TokenizationContext, TokenizationProvider } from '../types'
import { generateTicker } from '../ticker'
import { firstLabel, suffixOf } from '../utils'

const ELIGIBLE_SUFFIXES = new Set(['.com', '.net', '.org', '.io', '.eth', '.crypto'])
const TRADITIONAL_SUFFIXES = new Set(['.com', '.net', '.org', '.io', '.co', '.me', '.tv', '.cc', '.ws'])
const BRIDGEABLE_SUFFIXES = new Set(['.eth', '.crypto'])

const PREMIUM_FRAGMENTS = ['crypto', 'defi', 'nft', 'web3', 'blockchain', 'ethereum', 'bitcoin', 'solana']

export const SIMULATED_CHAIN = 'solana'
export const SIMULATED_LENDING_PLATFORM = 'Domain Lending'

const DAY_MS = 24 * 60 * 60 * 1000

// deterministic base58 address per (purpose, domain)
const deriveAddress = (purpose: string, domain: string): string => {
  const seed = createHash('sha256').update(`${purpose}:${domain}`).digest()
  return Keypair.fromSeed(seed).publicKey.toBase58()
}

export const simulatedTokenId = (domain: string): string =>
  Buffer.from(domain, 'utf8').toString('hex').slice(0, 20)

const simulatedRecord = (domain: string, now: Date): TokenRecord => ({
  tokenId: simulatedTokenId(domain),
  resolver: deriveAddress('resolver', domain),
  records: {
    A: '192.0.2.1',
    AAAA: '2001:db8::1',
    TXT: 'v=spf1 -all',
    SOL: deriveAddress('owner', domain),
  },
  registrationDate: new Date(now.getTime() - 365 * DAY_MS),
  expirationDate: new Date(now.getTime() + 365 * DAY_MS),
  lastUpdated: now,
  syncStatus: 'synced',
})

const simulatedCrossChain = (domain: string): CrossChainPresence[] => [
  { chain: 'ethereum', contractAddress: '0x' + 'e'.repeat(40), bridged: false, tokenId: simulatedTokenId(domain) },
  { chain: 'polygon', contractAddress: '0x' + 'f'.repeat(40), bridged: true },
  { chain: 'arbitrum', contractAddress: '0x' + 'd'.repeat(40), bridged: true },
]

/** Short and crypto-flavoured names are tokenized; mid-length names are, half the time. */
export const isSimulatedTokenized = (domain: string): boolean => {
  if (!ELIGIBLE_SUFFIXES.has(suffixOf(domain))) return false

  const label = firstLabel(domain).toLowerCase()
  if (label.length <= 3) return true
  if (PREMIUM_FRAGMENTS.some((fragment) => label.includes(fragment))) return true
  if (label.length >= 4 && label.length <= 8) return label.length % 2 === 0
  return false
}

export const checkTokenizationEligibility = (domain: string): { eligible: boolean; reason: string } => {
  const suffix = suffixOf(domain)
  if (TRADITIONAL_SUFFIXES.has(suffix)) {
    return { eligible: true, reason: 'Traditional domain eligible for tokenization' }
  }
  if (BRIDGEABLE_SUFFIXES.has(suffix)) {
    return { eligible: true, reason: 'Blockchain domain eligible for bridging' }
  }
  return { eligible: false, reason: 'Domain type not supported for tokenization' }
}

/**
 * Stand-in for a real tokenization registry. Addresses, ids and amounts are derived from the
 * domain alone, so repeated lookups agree. Record dates are relative to the lookup.
 */
export const simulatedTokenizationProvider: TokenizationProvider = {
  name: 'simulated',

  lookup: async (domain) => {
    if (!isSimulatedTokenized(domain)) return { tokenized: false }

    const context: TokenizationContext = {
      tokenized: true,
      chain: SIMULATED_CHAIN,
      mint: deriveAddress('mint', domain),
      owner: deriveAddress('owner', domain),
      ticker: generateTicker(domain),
      rights: {
        total: 1000,
        available: 750,
        locked: 250,
        breakdown: { ownership: 500, revenue: 300, governance: 150, utility: 50 },
        fractionalOwners: [1, 2, 3].map((n) => deriveAddress(`fraction-${n}`, domain)),
      },
      defi: {
        isCollateral: true,
        lendingPlatform: SIMULATED_LENDING_PLATFORM,
        collateralLamports: 50 * LAMPORTS_PER_SOL,
        borrowedLamports: 30 * LAMPORTS_PER_SOL,
        yieldGeneration: true,
        stakingRewardsLamports: 1_255_500_000,
      },
      record: simulatedRecord(domain, new Date()),
      crossChain: simulatedCrossChain(domain),
    }
    return context
  },
}
