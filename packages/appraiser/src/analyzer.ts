import type {
  AnalysisResult,
  AppConfig,
  ChainResult,
  DnsResult,
  TokenizationProvider,
  WhoisResult,
} from './types'
import { Logger } from './logger'
import { ValuationEngine } from './valuation'
import { DnsChecker, createResolverQuery } from './providers/dns'
import { WhoisClient, queryWhoisServer } from './providers/whois'
import { checkChainDomain, isChainDomain } from './providers/chain'
import { simulatedTokenizationProvider } from './providers/tokenization'
import { errorMessage, withTimeout } from './utils'

export interface AnalyzerDeps {
  dns: { check: (domain: string) => Promise<DnsResult> }
  whois: { lookup: (domain: string) => Promise<WhoisResult> }
  chain: (domain: string) => Promise<ChainResult>
  tokenization: TokenizationProvider
  engine: ValuationEngine
}

export const createDefaultDeps = (config: AppConfig, log: Logger): AnalyzerDeps => ({
  dns: new DnsChecker(createResolverQuery(config.dnsTimeoutMs), log.child('dns')),
  whois: new WhoisClient(queryWhoisServer, config.whoisTimeoutMs, log.child('whois')),
  chain: checkChainDomain,
  tokenization: simulatedTokenizationProvider,
  engine: new ValuationEngine(),
})

/**
 * Runs every lookup for a domain and values it. Lookups are best effort: one that rejects or
 * overruns the lookup timeout is logged and left out of the result. Valuation always runs.
 */
export class DomainAnalyzer {
  private deps: AnalyzerDeps
  private lookupTimeoutMs: number
  private log: Logger

  constructor(deps: AnalyzerDeps, lookupTimeoutMs: number, log: Logger) {
    this.deps = deps
    this.lookupTimeoutMs = lookupTimeoutMs
    this.log = log
  }

  analyze = async (domain: string): Promise<AnalysisResult> => {
    if (domain === '') throw new Error('domain cannot be empty')

    const timestamp = new Date()
    const { dns, whois, chain, tokenization, engine } = this.deps

    const tokenContext = await this.settle(`tokenization (${tokenization.name})`, () =>
      tokenization.lookup(domain),
    )

    const result: AnalysisResult = {
      domain,
      timestamp,
      valuation: engine.evaluate(domain, tokenContext),
    }
    if (tokenContext) result.tokenization = tokenContext

    if (isChainDomain(domain)) {
      const chainResult = await this.settle('chain', () => chain(domain))
      if (chainResult) result.chain = chainResult
    } else {
      const [dnsResult, whoisResult] = await Promise.all([
        this.settle('dns', () => dns.check(domain)),
        this.settle('whois', () => whois.lookup(domain)),
      ])
      if (dnsResult) result.dns = dnsResult
      if (whoisResult) result.whois = whoisResult
    }

    this.log.info(
      `${domain}: $${result.valuation.estimatedValue} (${result.valuation.confidence} confidence)`,
    )
    return result
  }

  private settle = async <T>(label: string, run: () => Promise<T>): Promise<T | undefined> => {
    try {
      return await withTimeout(run(), this.lookupTimeoutMs, `${label} lookup`)
    } catch (err) {
      this.log.warn(`${label} lookup failed: ${errorMessage(err)}`)
      return undefined
    }
  }
}
