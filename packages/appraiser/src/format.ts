import type { AnalysisResult, ChainResult, DnsResult, OutputFormat, TokenizationContext, WhoisResult } from './types'
import type { ValuationResult } from './valuation'
import { sol } from './utils'

export const OUTPUT_FORMATS: OutputFormat[] = ['table', 'json']

const LABEL_WIDTH = 22
const RULE = '='.repeat(60)

export const parseFormat = (value: string): OutputFormat | null =>
  OUTPUT_FORMATS.find((format) => format === value) ?? null

const row = (label: string, value: string | number, indent = 0): string =>
  `${' '.repeat(indent)}${`${label}:`.padEnd(LABEL_WIDTH - indent)}${value}`

const heading = (title: string): string[] => [title, '-'.repeat(title.length)]

const day = (date: Date): string => date.toISOString().slice(0, 10)

const timestamp = (date: Date): string => `${date.toISOString().replace('T', ' ').slice(0, 19)} UTC`

const status = (available: boolean): string => (available ? 'available' : 'taken')

const yesNo = (flag: boolean): string => (flag ? 'yes' : 'no')

const capitalize = (word: string): string => word.charAt(0).toUpperCase() + word.slice(1)

const dnsSection = (dns: DnsResult): string[] => {
  const lines = [...heading('DNS AVAILABILITY'), row('Status', status(dns.available)), row('Suffix', dns.suffix)]
  if (dns.hasRecords) lines.push(row('Records', dns.recordTypes.join(', ')))
  if (dns.error) lines.push(row('Error', dns.error))
  return lines
}

const chainSection = (chain: ChainResult): string[] => {
  const lines = [...heading('BLOCKCHAIN DATA'), row('Status', status(chain.available))]
  if (chain.type) lines.push(row('Type', chain.type))
  if (chain.owner) lines.push(row('Owner', chain.owner))
  if (chain.resolver) lines.push(row('Resolver', chain.resolver))
  const records = Object.entries(chain.records)
  if (records.length > 0) {
    lines.push('Records:')
    for (const [key, value] of records) lines.push(row(key, value, 2))
  }
  if (chain.error) lines.push(row('Error', chain.error))
  return lines
}

const tokenizationSection = (context: TokenizationContext): string[] => {
  const lines = [...heading('TOKENIZATION'), row('Tokenized', yesNo(context.tokenized))]
  if (context.chain) lines.push(row('Chain', context.chain))
  if (context.ticker) lines.push(row('Ticker', `$${context.ticker}`))
  if (context.mint) lines.push(row('Mint', context.mint))
  if (context.owner) lines.push(row('Owner', context.owner))
  if (context.rights) {
    const { total, available, locked } = context.rights
    lines.push(row('Token Rights', `${available}/${total} available, ${locked} locked`))
  }
  if (context.defi?.isCollateral) {
    const defi = context.defi
    lines.push(row('Collateral', `${sol(defi.collateralLamports)} SOL on ${defi.lendingPlatform ?? 'unknown platform'}`))
    lines.push(row('Borrowed', `${sol(defi.borrowedLamports)} SOL`))
  }
  if (context.error) lines.push(row('Error', context.error))
  return lines
}

const whoisSection = (whois: WhoisResult): string[] => {
  const lines = [...heading('WHOIS DATA'), row('Status', status(whois.available))]
  if (whois.registrar) lines.push(row('Registrar', whois.registrar))
  if (whois.registrationDate) lines.push(row('Created', day(whois.registrationDate)))
  if (whois.expiryDate) lines.push(row('Expires', day(whois.expiryDate)))
  if (whois.updatedDate) lines.push(row('Updated', day(whois.updatedDate)))
  if (whois.nameServers.length > 0) lines.push(row('Name Servers', whois.nameServers.join(', ')))
  if (whois.status.length > 0) lines.push(row('Domain Status', whois.status.join(', ')))
  if (whois.error) lines.push(row('Error', whois.error))
  return lines
}

const valuationSection = (valuation: ValuationResult): string[] => {
  const f = valuation.factors
  const lines = [
    ...heading('DOMAIN VALUATION'),
    row('Estimated Value', `$${valuation.estimatedValue} ${valuation.currency}`),
    row('Confidence', capitalize(valuation.confidence)),
    row('Reasoning', valuation.reasoning),
    '',
    'Valuation Factors:',
    row('Length', `${f.length} chars (score ${f.lengthScore.toFixed(1)}/10)`, 2),
    row('Character Quality', `${f.characterScore.toFixed(1)}/5`, 2),
    row('Word Value', `${f.wordScore.toFixed(1)}/10`, 2),
    row('Suffix Value', `${f.suffixScore.toFixed(1)}/5`, 2),
    row('Brandable', yesNo(f.brandable), 2),
    row('Pronounceable', yesNo(f.pronounceable), 2),
  ]
  if (f.hasDigits) lines.push(row('Contains Numbers', 'yes (reduces value)', 2))
  if (f.hasHyphen) lines.push(row('Contains Hyphens', 'yes (reduces value)', 2))
  return lines
}

export const renderTable = (result: AnalysisResult): string => {
  const sections: string[][] = [
    ['DOMAIN ANALYSIS REPORT', RULE, row('Domain', result.domain), row('Analyzed', timestamp(result.timestamp))],
  ]
  if (result.dns) sections.push(dnsSection(result.dns))
  if (result.chain) sections.push(chainSection(result.chain))
  if (result.tokenization) sections.push(tokenizationSection(result.tokenization))
  if (result.whois) sections.push(whoisSection(result.whois))
  sections.push(valuationSection(result.valuation))

  return sections.map((lines) => lines.join('\n')).join('\n\n') + '\n'
}

export const renderJson = (result: AnalysisResult): string => JSON.stringify(result, null, 2) + '\n'

export const renderReport = (result: AnalysisResult, format: OutputFormat): string =>
  format === 'json' ? renderJson(result) : renderTable(result)
