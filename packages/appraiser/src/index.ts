#!/usr/bin/env node

import { loadConfig } from './config'
import { Logger } from './logger'
import { DomainAnalyzer, createDefaultDeps } from './analyzer'
import { renderReport } from './format'
import { USAGE, parseArgs } from './cli'

// valuation exports
export * from './valuation'

// lookup & analysis exports
export { DomainAnalyzer, createDefaultDeps } from './analyzer'
export type { AnalyzerDeps } from './analyzer'
export { DnsChecker, createResolverQuery } from './providers/dns'
export type { DnsQuery, RecordResolver } from './providers/dns'
export { WhoisClient, queryWhoisServer, parseWhoisResponse, parseWhoisDate, whoisServerFor } from './providers/whois'
export type { WhoisTransport } from './providers/whois'
export { checkChainDomain, isChainDomain } from './providers/chain'
export {
  simulatedTokenizationProvider,
  checkTokenizationEligibility,
} from './providers/tokenization'
export { generateTicker } from './ticker'
export { renderReport, renderTable, renderJson, parseFormat } from './format'
export { parseArgs } from './cli'
export { loadConfig } from './config'
export { Logger } from './logger'
export type {
  AppConfig,
  AnalysisResult,
  ChainResult,
  DnsResult,
  WhoisResult,
  TokenizationContext,
  TokenRecord,
  TokenRights,
  CrossChainPresence,
  TokenizationProvider,
  OutputFormat,
  LogLevel,
} from './types'

const main = async () => {
  const args = parseArgs(process.argv.slice(2))

  if (args.kind === 'help') {
    console.log(USAGE)
    return
  }
  if (args.kind === 'error') {
    console.error(`error: ${args.message}\n`)
    console.error(USAGE)
    process.exit(1)
  }

  const config = loadConfig()
  const log = new Logger('appraiser', config.logLevel)
  const analyzer = new DomainAnalyzer(createDefaultDeps(config, log), config.lookupTimeoutMs, log)

  const result = await analyzer.analyze(args.domain)
  process.stdout.write(renderReport(result, args.format))
}

// only run CLI when executed directly
if (require.main === module) {
  main().catch((err) => {
    console.error('FATAL:', err)
    process.exit(1)
  })
}
