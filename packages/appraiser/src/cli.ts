import type { OutputFormat } from './types'
import { OUTPUT_FORMATS, parseFormat } from './format'

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'run'; domain: string; format: OutputFormat }
  | { kind: 'error'; message: string }

export const USAGE = `domain-appraiser — domain availability, WHOIS and value estimate

Usage:
  domain-appraiser <domain> [--format table|json]

Options:
  -f, --format <format>   Output format: ${OUTPUT_FORMATS.join(', ')} (default table)
  -h, --help              Show this help message

Examples:
  domain-appraiser example.com
  domain-appraiser mydomain.eth --format json
`

const fail = (message: string): ParsedArgs => ({ kind: 'error', message })

export const parseArgs = (argv: string[]): ParsedArgs => {
  let domain: string | undefined
  let formatArg = 'table'

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '-h' || arg === '--help') return { kind: 'help' }

    if (arg.startsWith('--format=')) {
      formatArg = arg.slice('--format='.length)
    } else if (arg === '--format' || arg === '-f') {
      const value = argv[i + 1]
      if (value === undefined) return fail(`${arg} needs a value`)
      formatArg = value
      i++
    } else if (arg.startsWith('-')) {
      return fail(`unknown option: ${arg}`)
    } else if (domain === undefined) {
      domain = arg
    } else {
      return fail(`unexpected argument: ${arg}`)
    }
  }

  if (domain === undefined) return fail('a domain is required')

  const cleaned = domain.trim().toLowerCase()
  if (cleaned === '') return fail('domain cannot be empty')

  const format = parseFormat(formatArg)
  if (!format) return fail(`unsupported format: ${formatArg} (expected ${OUTPUT_FORMATS.join(' or ')})`)

  return { kind: 'run', domain: cleaned, format }
}
