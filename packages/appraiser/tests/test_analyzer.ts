/**
 * Analyzer, Report & CLI Tests
 *
 * Runs the analyzer against mock providers, renders reports, parses CLI arguments.
 * No network access required.
 *
 * Run:
 *   npx tsx tests/test_analyzer.ts
 */

import { DomainAnalyzer } from '../src/analyzer'
import type { AnalyzerDeps } from '../src/analyzer'
import { ValuationEngine } from '../src/valuation'
import { Logger } from '../src/logger'
import { parseFormat, renderJson, renderReport, renderTable } from '../src/format'
import { parseArgs } from '../src/cli'
import type { AnalysisResult, TokenizationProvider } from '../src/types'
import {
  FIXED_TIME,
  assert,
  assertEqual,
  assertRejects,
  banner,
  hang,
  registeredWhois,
  run,
  section,
  takenChain,
  takenDns,
  tokenizedContext,
} from './setup'

const log = new Logger('test', 'error') // suppress logs in tests
const engine = new ValuationEngine()

const BASE_REASONING = 'Very short domain (premium); Brandable name; Easy to pronounce; Contains valuable keywords'

const mockTokenization: TokenizationProvider = {
  name: 'mock',
  lookup: async () => tokenizedContext(),
}

const failingTokenization: TokenizationProvider = {
  name: 'failing',
  lookup: async () => {
    throw new Error('registry down')
  },
}

const mockDeps = (): AnalyzerDeps => ({
  dns: { check: async () => takenDns() },
  whois: { lookup: async () => registeredWhois() },
  chain: async () => takenChain(),
  tokenization: mockTokenization,
  engine,
})

const failingDeps = (): AnalyzerDeps => ({
  dns: {
    check: async () => {
      throw new Error('resolver down')
    },
  },
  whois: {
    lookup: async () => {
      throw new Error('whois down')
    },
  },
  chain: async () => {
    throw new Error('chain down')
  },
  tokenization: failingTokenization,
  engine,
})

// label padded to the report's column width
const line = (label: string, value: string, indent = 0): string =>
  `${' '.repeat(indent)}${`${label}:`.padEnd(22 - indent)}${value}`

banner('ANALYZER, REPORT & CLI TESTS')

const runSuite = async () => {
  // ==========================================================================
  // Analyzer
  // ==========================================================================

  section('[1] Analyzer')

  const analyzer = new DomainAnalyzer(mockDeps(), 1000, log)

  const full = await analyzer.analyze('app.com')
  assertEqual('domain echoed', full.domain, 'app.com')
  assert('dns section present', full.dns !== undefined)
  assert('whois section present', full.whois !== undefined)
  assertEqual('no chain section for .com', full.chain, undefined)
  assertEqual('tokenization attached', full.tokenization?.tokenized, true)
  assertEqual('valuation estimate', full.valuation.estimatedValue, 522)
  assertEqual(
    'tokenization folded into reasoning',
    full.valuation.reasoning,
    `${BASE_REASONING}; Tokenized on solana as $APP; ` +
      'Used as collateral on Domain Lending (50.0000 SOL locked, 30.0000 SOL borrowed); Generating yield',
  )

  const onChain = await analyzer.analyze('myname.eth')
  assertEqual('chain section for .eth', onChain.chain?.type, 'ENS')
  assertEqual('no dns for chain domain', onChain.dns, undefined)
  assertEqual('no whois for chain domain', onChain.whois, undefined)
  assertEqual('chain domain valued', onChain.valuation.estimatedValue, 251)

  const degraded = await new DomainAnalyzer(failingDeps(), 1000, log).analyze('app.com')
  assertEqual('failed dns left out', degraded.dns, undefined)
  assertEqual('failed whois left out', degraded.whois, undefined)
  assertEqual('failed tokenization left out', degraded.tokenization, undefined)
  assertEqual('valuation runs when every lookup fails', degraded.valuation.estimatedValue, 522)
  assertEqual('reasoning without tokenization', degraded.valuation.reasoning, BASE_REASONING)

  const failedChain = await new DomainAnalyzer(failingDeps(), 1000, log).analyze('myname.eth')
  assertEqual('failed chain left out', failedChain.chain, undefined)
  assertEqual('chain failure still valued', failedChain.valuation.confidence, 'high')

  const hungDeps: AnalyzerDeps = { ...mockDeps(), dns: { check: () => hang() } }
  const slow = await new DomainAnalyzer(hungDeps, 20, log).analyze('app.com')
  assertEqual('hung lookup times out and is left out', slow.dns, undefined)
  assert('other lookups unaffected by the hang', slow.whois !== undefined)

  const bare = await analyzer.analyze('localhost')
  assertEqual('bare name floor estimate', bare.valuation.estimatedValue, 10)
  assertEqual('bare name low confidence', bare.valuation.confidence, 'low')

  await assertRejects('empty domain rejected', analyzer.analyze(''), 'domain cannot be empty')

  // ==========================================================================
  // Report rendering
  // ==========================================================================

  section('[2] Report Rendering')

  const result: AnalysisResult = {
    domain: 'app.com',
    timestamp: FIXED_TIME,
    dns: takenDns(),
    whois: registeredWhois(),
    valuation: engine.evaluate('app.com'),
  }

  const table = renderTable(result)
  const lines = table.split('\n')
  assertEqual('title line', lines[0], 'DOMAIN ANALYSIS REPORT')
  assert('domain line', lines.includes(line('Domain', 'app.com')))
  assert('timestamp line', lines.includes(line('Analyzed', '2026-01-02 03:04:05 UTC')))
  assert('dns records line', lines.includes(line('Records', 'A, MX')))
  assert('registrar line', lines.includes(line('Registrar', 'Example Registrar, Inc.')))
  assert('creation date line', lines.includes(line('Created', '1995-08-14')))
  assert('estimate line', lines.includes(line('Estimated Value', '$522 USD')))
  assert('confidence capitalised', lines.includes(line('Confidence', 'High')))
  assert('reasoning line', lines.includes(line('Reasoning', BASE_REASONING)))
  assert('length factor line', lines.includes(line('Length', '3 chars (score 10.0/10)', 2)))
  assert('character factor line', lines.includes(line('Character Quality', '6.0/5', 2)))
  assert('word factor line', lines.includes(line('Word Value', '5.0/10', 2)))
  assert('suffix factor line', lines.includes(line('Suffix Value', '5.0/5', 2)))
  assert('brandable line', lines.includes(line('Brandable', 'yes', 2)))
  assert('no digit penalty line', !lines.some((l) => l.startsWith('  Contains Numbers')))
  assert('no chain section', !lines.includes('BLOCKCHAIN DATA'))
  assert('ends with a newline', table.endsWith('\n'))

  const tokenTable = renderTable({ ...result, tokenization: tokenizedContext() })
  assert('tokenization ticker line', tokenTable.split('\n').includes(line('Ticker', '$APP')))
  assert(
    'tokenization collateral line',
    tokenTable.split('\n').includes(line('Collateral', '50.0000 SOL on Domain Lending')),
  )

  const digitsTable = renderTable({ ...result, valuation: engine.evaluate('test123.com') })
  assert('digit penalty line', digitsTable.split('\n').includes(line('Contains Numbers', 'yes (reduces value)', 2)))

  const parsed = JSON.parse(renderJson(result))
  assertEqual('json estimate', parsed.valuation.estimatedValue, 522)
  assertEqual('json confidence', parsed.valuation.confidence, 'high')
  assertEqual('json timestamp', parsed.timestamp, '2026-01-02T03:04:05.000Z')
  assertEqual('json brandable', parsed.valuation.factors.brandable, true)
  assertEqual('json format dispatch', renderReport(result, 'json'), renderJson(result))
  assertEqual('table format dispatch', renderReport(result, 'table'), table)

  assertEqual('parse json format', parseFormat('json'), 'json')
  assertEqual('parse table format', parseFormat('table'), 'table')
  assertEqual('reject unknown format', parseFormat('xml'), null)

  // ==========================================================================
  // CLI arguments
  // ==========================================================================

  section('[3] CLI Arguments')

  const plain = parseArgs(['app.com'])
  assert('domain only', plain.kind === 'run' && plain.domain === 'app.com' && plain.format === 'table')

  const cleaned = parseArgs(['  App.COM ', '--format=json'])
  assert('domain cleaned, inline format', cleaned.kind === 'run' && cleaned.domain === 'app.com' && cleaned.format === 'json')

  const short = parseArgs(['-f', 'json', 'app.com'])
  assert('short format flag', short.kind === 'run' && short.format === 'json')

  assertEqual('long help', parseArgs(['--help']).kind, 'help')
  assertEqual('short help after domain', parseArgs(['app.com', '-h']).kind, 'help')

  const errorOf = (argv: string[]): string => {
    const args = parseArgs(argv)
    return args.kind === 'error' ? args.message : `no error (${args.kind})`
  }
  assertEqual('missing domain', errorOf([]), 'a domain is required')
  assertEqual('unknown format', errorOf(['app.com', '--format', 'xml']), 'unsupported format: xml (expected table or json)')
  assertEqual('format without value', errorOf(['app.com', '--format']), '--format needs a value')
  assertEqual('extra argument', errorOf(['app.com', 'extra']), 'unexpected argument: extra')
  assertEqual('unknown option', errorOf(['--verbose', 'app.com']), 'unknown option: --verbose')
  assertEqual('blank domain', errorOf(['   ']), 'domain cannot be empty')
}

run(runSuite)
