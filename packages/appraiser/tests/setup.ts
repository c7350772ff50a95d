/**
 * setup.ts: shared assertions and fixtures for the unit test scripts.
 *
 * Each test file runs standalone:
 *   npx tsx tests/test_valuation.ts
 */

import type { ChainResult, DnsResult, TokenizationContext, WhoisResult } from '../src/types'

// ============================================================================
// Assertions
// ============================================================================

let passed = 0
let failed = 0

const ok = (name: string, detail?: string) => {
  passed++
  console.log(`  ✓ ${name}${detail ? ` — ${detail}` : ''}`)
}

const fail = (name: string, err: string) => {
  failed++
  console.log(`  ✗ ${name} — ${err}`)
}

export const assert = (name: string, condition: boolean, detail?: string) => {
  if (condition) ok(name, detail)
  else fail(name, detail ?? 'assertion failed')
}

const show = (value: unknown): string => (typeof value === 'string' ? JSON.stringify(value) : String(value))

export const assertEqual = <T>(name: string, actual: T, expected: T) => {
  if (Object.is(actual, expected)) ok(name, `got ${show(actual)}`)
  else fail(name, `expected ${show(expected)}, got ${show(actual)}`)
}

// structural comparison for arrays and plain records
export const assertJson = (name: string, actual: unknown, expected: unknown) => {
  const a = JSON.stringify(actual)
  const e = JSON.stringify(expected)
  if (a === e) ok(name)
  else fail(name, `expected ${e}, got ${a}`)
}

export const assertThrows = (name: string, run: () => unknown, message: string) => {
  try {
    run()
    fail(name, 'did not throw')
  } catch (err) {
    const actual = err instanceof Error ? err.message : String(err)
    assertEqual(name, actual, message)
  }
}

export const assertRejects = async (name: string, promise: Promise<unknown>, message: string) => {
  try {
    await promise
    fail(name, 'did not reject')
  } catch (err) {
    const actual = err instanceof Error ? err.message : String(err)
    assertEqual(name, actual, message)
  }
}

export const banner = (title: string) => {
  console.log('='.repeat(60))
  console.log(title)
  console.log('='.repeat(60))
}

export const section = (title: string) => console.log(`\n${title}`)

export const finish = () => {
  console.log('\n' + '='.repeat(60))
  console.log(`RESULTS: ${passed} passed, ${failed} failed`)
  console.log('='.repeat(60))

  if (failed > 0) process.exit(1)
}

export const run = (suite: () => Promise<void>) => {
  suite()
    .then(finish)
    .catch((err) => {
      console.error('\nFATAL:', err)
      process.exit(1)
    })
}

// ============================================================================
// Fixtures
// ============================================================================

export const FIXED_TIME = new Date('2026-01-02T03:04:05Z')

export const takenDns = (): DnsResult => ({
  available: false,
  suffix: '.com',
  hasRecords: true,
  recordTypes: ['A', 'MX'],
  checkedAt: FIXED_TIME,
})

export const registeredWhois = (): WhoisResult => ({
  available: false,
  server: 'whois.verisign-grs.com',
  registrar: 'Example Registrar, Inc.',
  registrationDate: new Date('1995-08-14T04:00:00Z'),
  nameServers: ['NS1.EXAMPLE.TEST'],
  status: ['clientTransferProhibited'],
  checkedAt: FIXED_TIME,
})

export const takenChain = (): ChainResult => ({
  available: false,
  type: 'ENS',
  owner: '0x' + 'a'.repeat(40),
  records: {},
  checkedAt: FIXED_TIME,
})

export const tokenizedContext = (): TokenizationContext => ({
  tokenized: true,
  chain: 'solana',
  ticker: 'APP',
  rights: { total: 1000, available: 750, locked: 250 },
  defi: {
    isCollateral: true,
    lendingPlatform: 'Domain Lending',
    collateralLamports: 50_000_000_000,
    borrowedLamports: 30_000_000_000,
    yieldGeneration: true,
    stakingRewardsLamports: 1_255_500_000,
  },
})

// a lookup that never settles
export const hang = <T>(): Promise<T> => new Promise<T>(() => undefined)
