import type { ChainNameService, ChainResult } from '../types'
import { firstLabel, suffixOf } from '../utils'

/**
 * Simulated on-chain name-service lookups. No chain is queried: names are taken when they are
 * on a short reserved list or their first label has three characters or fewer.
 */

const CHAIN_SUFFIXES = new Set([
  '.eth', '.crypto', '.nft', '.x', '.wallet', '.bitcoin', '.dao', '.888', '.zil', '.blockchain',
])

const UNSTOPPABLE_SUFFIXES = new Set(['.crypto', '.nft', '.x', '.wallet', '.bitcoin', '.dao', '.888', '.zil'])

const TAKEN: Record<ChainNameService, string[]> = {
  ENS: ['test.eth', 'example.eth', 'hello.eth', 'world.eth'],
  'Unstoppable Domains': ['test.crypto', 'example.nft', 'hello.x'],
}

const evmAddress = (fill: string): string => '0x' + fill.repeat(40)
const btcAddress = (fill: string): string => 'bc1' + fill.repeat(39)

export const isChainDomain = (domain: string): boolean => CHAIN_SUFFIXES.has(suffixOf(domain))

export const nameServiceFor = (domain: string): ChainNameService | null => {
  const suffix = suffixOf(domain)
  if (suffix === '.eth') return 'ENS'
  if (UNSTOPPABLE_SUFFIXES.has(suffix)) return 'Unstoppable Domains'
  return null
}

const isAvailable = (service: ChainNameService, domain: string): boolean =>
  !TAKEN[service].includes(domain) && firstLabel(domain).length > 3

export const checkChainDomain = async (domain: string): Promise<ChainResult> => {
  const result: ChainResult = { available: false, records: {}, checkedAt: new Date() }

  const service = nameServiceFor(domain)
  if (!service) {
    result.error = 'unsupported blockchain domain type'
    return result
  }

  result.type = service
  result.available = isAvailable(service, domain)
  if (result.available) return result

  if (service === 'ENS') {
    result.owner = evmAddress('a')
    result.resolver = evmAddress('b')
    result.records.ETH = evmAddress('c')
    result.records.BTC = btcAddress('d')
  } else {
    result.owner = evmAddress('e')
    result.records['crypto.ETH.address'] = evmAddress('f')
    result.records['crypto.BTC.address'] = btcAddress('g')
  }
  return result
}
