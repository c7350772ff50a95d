import type { ValuationResult } from './valuation/types'

// ── log level ──────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

// ── app config ─────────────────────────────────────────────────────────────────

export interface AppConfig {
  logLevel: LogLevel
  dnsTimeoutMs: number
  whoisTimeoutMs: number
  lookupTimeoutMs: number
}

// ── dns ────────────────────────────────────────────────────────────────────────

export type DnsRecordType = 'A' | 'MX' | 'NS' | 'TXT'

export interface DnsResult {
  available: boolean
  suffix: string
  hasRecords: boolean
  recordTypes: DnsRecordType[]
  checkedAt: Date
  error?: string
}

// ── whois ──────────────────────────────────────────────────────────────────────

export interface WhoisResult {
  available: boolean
  server?: string
  registrar?: string
  registrationDate?: Date
  expiryDate?: Date
  updatedDate?: Date
  nameServers: string[]
  status: string[]
  checkedAt: Date
  rawData?: string
  error?: string
}

// ── on-chain name services ─────────────────────────────────────────────────────

export type ChainNameService = 'ENS' | 'Unstoppable Domains'

export interface ChainResult {
  available: boolean
  type?: ChainNameService
  owner?: string
  resolver?: string
  records: Record<string, string>
  checkedAt: Date
  error?: string
}

// ── tokenization ───────────────────────────────────────────────────────────────

export interface TokenRights {
  total: number
  available: number
  locked: number
  breakdown?: Record<string, number>
  fractionalOwners?: string[]
}

/** Registry entry behind a tokenized domain. */
export interface TokenRecord {
  tokenId: string
  resolver: string
  records: Record<string, string>
  registrationDate: Date
  expirationDate: Date
  lastUpdated: Date
  syncStatus: 'synced' | 'pending'
}

export interface CrossChainPresence {
  chain: string
  contractAddress: string
  bridged: boolean
  tokenId?: string
}

export interface DefiStatus {
  isCollateral: boolean
  lendingPlatform?: string
  collateralLamports: number
  borrowedLamports: number
  yieldGeneration: boolean
  stakingRewardsLamports: number
}

export interface TokenizationContext {
  tokenized: boolean
  chain?: string
  mint?: string
  owner?: string
  ticker?: string
  rights?: TokenRights
  defi?: DefiStatus
  record?: TokenRecord
  crossChain?: CrossChainPresence[]
  error?: string
}

export interface TokenizationProvider {
  name: string
  lookup: (domain: string) => Promise<TokenizationContext>
}

// ── analysis result ────────────────────────────────────────────────────────────

export interface AnalysisResult {
  domain: string
  timestamp: Date
  dns?: DnsResult
  whois?: WhoisResult
  chain?: ChainResult
  tokenization?: TokenizationContext
  valuation: ValuationResult
}

export type OutputFormat = 'table' | 'json'
