import { firstLabel } from './utils'

const MIN_LENGTH = 3
const MAX_LENGTH = 6
const PREFIX_LENGTH = 5
const FALLBACK = 'TKN'

const fromWord = (word: string): string => (word.length <= MAX_LENGTH ? word : word.slice(0, PREFIX_LENGTH))

// short first word wins, otherwise the acronym
const fromWords = (words: string[]): string =>
  words[0].length <= 4 ? words[0] : words.map((w) => w[0]).join('')

/**
 * Token ticker for a domain: 3-6 upper-case characters built from the first label.
 *
 * `app.com` -> `APP`, `cryptocurrency.com` -> `CRYPT`, `super-crypto-defi.io` -> `SCD`,
 * `a.com` -> `AXX`.
 */
export const generateTicker = (domain: string): string => {
  const words = firstLabel(domain)
    .split('-')
    .filter((w) => w.length > 0)

  let ticker = FALLBACK
  if (words.length === 1) ticker = fromWord(words[0])
  else if (words.length > 1) ticker = fromWords(words)

  return ticker.padEnd(MIN_LENGTH, 'X').slice(0, MAX_LENGTH).toUpperCase()
}
