import { createConnection } from 'net'
import type { WhoisResult } from '../types'
import type { Logger } from '../logger'
import { errorMessage, suffixOf } from '../utils'

const WHOIS_PORT = 43

const WHOIS_SERVERS: Record<string, string> = {
  '.com': 'whois.verisign-grs.com',
  '.net': 'whois.verisign-grs.com',
  '.org': 'whois.pir.org',
  '.info': 'whois.afilias.net',
  '.biz': 'whois.neulevel.biz',
  '.name': 'whois.nic.name',
  '.io': 'whois.nic.io',
  '.co': 'whois.nic.co',
  '.me': 'whois.nic.me',
  '.tv': 'whois.nic.tv',
  '.cc': 'ccwhois.verisign-grs.com',
  '.ws': 'whois.website.ws',
}

const AVAILABLE_MARKERS = ['no match', 'not found', 'no data found']

const CREATED_KEYS = new Set(['creation date', 'created', 'registration time'])
const EXPIRY_KEYS = new Set(['expiry date', 'registry expiry date', 'expires', 'expiration time'])
const UPDATED_KEYS = new Set(['updated date', 'last modified', 'last updated'])
const STATUS_KEYS = new Set(['status', 'domain status'])

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

export type WhoisTransport = (server: string, domain: string, timeoutMs: number) => Promise<string>

export const whoisServerFor = (domain: string): string | undefined => WHOIS_SERVERS[suffixOf(domain)]

const utc = (year: string, month: number, day: string, h = '0', m = '0', s = '0'): Date | null => {
  const date = new Date(Date.UTC(Number(year), month - 1, Number(day), Number(h), Number(m), Number(s)))
  return isNaN(date.getTime()) ? null : date
}

/** Parse the handful of date layouts registries actually emit. All are read as UTC. */
export const parseWhoisDate = (value: string): Date | null => {
  let m = value.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/)
  if (m) return utc(m[1], Number(m[2]), m[3], m[4], m[5], m[6])

  m = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/)
  if (m) return utc(m[1], Number(m[2]), m[3], m[4], m[5], m[6])

  m = value.match(/^(\d{4})[-/](\d{2})[-/](\d{2})$/)
  if (m) return utc(m[1], Number(m[2]), m[3])

  m = value.match(/^(\d{2})-([A-Za-z]{3})-(\d{4})$/)
  if (m) {
    const month = MONTHS.indexOf(m[2].toLowerCase())
    if (month < 0) return null
    return utc(m[3], month + 1, m[1])
  }

  return null
}

/** Fill a result from raw WHOIS text. A "no match" style line wins over everything else. */
export const parseWhoisResponse = (raw: string, result: WhoisResult): WhoisResult => {
  for (const rawLine of raw.split('\n')) {
    const line = rawLine.trim()
    if (line === '') continue

    const lower = line.toLowerCase()
    if (AVAILABLE_MARKERS.some((marker) => lower.includes(marker))) {
      result.available = true
      return result
    }

    const sep = line.indexOf(':')
    if (sep < 0) continue
    const key = line.slice(0, sep).trim().toLowerCase()
    const value = line.slice(sep + 1).trim()

    if (key === 'registrar') {
      result.registrar = value
    } else if (CREATED_KEYS.has(key)) {
      const date = parseWhoisDate(value)
      if (date) result.registrationDate = date
    } else if (EXPIRY_KEYS.has(key)) {
      const date = parseWhoisDate(value)
      if (date) result.expiryDate = date
    } else if (UPDATED_KEYS.has(key)) {
      const date = parseWhoisDate(value)
      if (date) result.updatedDate = date
    } else if (key === 'name server') {
      result.nameServers.push(value)
    } else if (STATUS_KEYS.has(key)) {
      result.status.push(value)
    }
  }

  if (result.registrar !== undefined || result.registrationDate !== undefined) {
    result.available = false
  }
  return result
}

export const queryWhoisServer: WhoisTransport = (server, domain, timeoutMs) =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const socket = createConnection({ host: server, port: WHOIS_PORT })

    socket.setTimeout(timeoutMs)
    socket.on('connect', () => socket.write(`${domain}\r\n`))
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')))
    socket.on('timeout', () => {
      socket.destroy()
      reject(new Error(`WHOIS query to ${server} timed out after ${timeoutMs}ms`))
    })
    socket.on('error', (err) => reject(new Error(`WHOIS query to ${server} failed: ${err.message}`)))
  })

export class WhoisClient {
  private transport: WhoisTransport
  private timeoutMs: number
  private log: Logger | undefined

  constructor(transport: WhoisTransport, timeoutMs: number, log?: Logger) {
    this.transport = transport
    this.timeoutMs = timeoutMs
    this.log = log
  }

  lookup = async (domain: string): Promise<WhoisResult> => {
    const result: WhoisResult = {
      available: false,
      nameServers: [],
      status: [],
      checkedAt: new Date(),
    }

    const server = whoisServerFor(domain)
    if (!server) {
      result.error = 'no WHOIS server found for domain'
      return result
    }
    result.server = server

    try {
      this.log?.debug(`querying ${server} for ${domain}`)
      const raw = await this.transport(server, domain, this.timeoutMs)
      result.rawData = raw
      return parseWhoisResponse(raw, result)
    } catch (err) {
      result.error = errorMessage(err)
      return result
    }
  }
}
