import { Resolver } from 'dns/promises'
import type { DnsRecordType, DnsResult } from '../types'
import type { Logger } from '../logger'
import { errorMessage, suffixOf } from '../utils'

export type DnsQuery = (domain: string, type: DnsRecordType) => Promise<unknown[]>

const RECORD_TYPES: DnsRecordType[] = ['A', 'MX', 'NS', 'TXT']

// resolver codes that only mean "nothing of this type"
const NO_ANSWER_CODES = new Set(['ENOTFOUND', 'ENODATA'])

const isNoAnswer = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && typeof err.code === 'string' && NO_ANSWER_CODES.has(err.code)

/** The slice of `dns/promises` `Resolver` the record queries use. */
export interface RecordResolver {
  resolve4(hostname: string): Promise<string[]>
  resolve6(hostname: string): Promise<string[]>
  resolveMx(hostname: string): Promise<unknown[]>
  resolveNs(hostname: string): Promise<string[]>
  resolveTxt(hostname: string): Promise<string[][]>
}

// IPv4 first; an IPv6-only host still has an address
const resolveAddresses = async (resolver: RecordResolver, domain: string): Promise<string[]> => {
  try {
    const v4 = await resolver.resolve4(domain)
    if (v4.length > 0) return v4
  } catch (err) {
    if (!isNoAnswer(err)) throw err
  }
  return resolver.resolve6(domain)
}

export const createResolverQuery = (
  timeoutMs: number,
  resolver: RecordResolver = new Resolver({ timeout: timeoutMs, tries: 1 }),
): DnsQuery => {
  return (domain, type) => {
    switch (type) {
      case 'A':
        return resolveAddresses(resolver, domain)
      case 'MX':
        return resolver.resolveMx(domain)
      case 'NS':
        return resolver.resolveNs(domain)
      case 'TXT':
        return resolver.resolveTxt(domain)
    }
  }
}

/**
 * Availability from published records: a domain with any address (IPv4 or IPv6), MX, NS or TXT
 * record is taken.
 */
export class DnsChecker {
  private query: DnsQuery
  private log: Logger | undefined

  constructor(query: DnsQuery, log?: Logger) {
    this.query = query
    this.log = log
  }

  check = async (domain: string): Promise<DnsResult> => {
    const recordTypes: DnsRecordType[] = []
    let error: string | undefined

    for (const type of RECORD_TYPES) {
      try {
        const records = await this.query(domain, type)
        if (records.length > 0) recordTypes.push(type)
      } catch (err) {
        if (isNoAnswer(err)) continue
        this.log?.debug(`${type} query failed for ${domain}`, errorMessage(err))
        if (error === undefined) error = `${type} lookup failed: ${errorMessage(err)}`
      }
    }

    const hasRecords = recordTypes.length > 0
    const result: DnsResult = {
      available: !hasRecords,
      suffix: suffixOf(domain),
      hasRecords,
      recordTypes,
      checkedAt: new Date(),
    }
    if (error !== undefined) result.error = error
    return result
  }
}
