import type { LexicalSignals, ValuationInput } from './types'

const DIGIT = /\p{Nd}/u
const LETTER = /^\p{L}$/u
const UPPER = /\p{Lu}/u
const LOWER = /\p{Ll}/u

/**
 * Split a domain at its last separator.
 *
 * `sub.app.com` -> `{ name: 'sub.app', suffix: '.com' }`. Without a separator the whole string is
 * the name and the suffix is empty.
 */
export const splitDomain = (domain: string): ValuationInput => {
  const dot = domain.lastIndexOf('.')
  if (dot < 0) return { name: domain, suffix: '' }
  return {
    name: domain.slice(0, dot),
    suffix: domain.slice(dot).toLowerCase(),
  }
}

/** Input the engine cannot score: no separator. An empty name before one is still scored. */
export const isDegraded = (input: ValuationInput): boolean => input.suffix === ''

export const codePointLength = (name: string): number => Array.from(name).length

export const hasDigits = (name: string): boolean => DIGIT.test(name)

export const hasHyphen = (name: string): boolean => name.includes('-')

export const isAllLetters = (name: string): boolean =>
  Array.from(name).every((ch) => LETTER.test(ch))

export const hasMixedCase = (name: string): boolean => UPPER.test(name) && LOWER.test(name)

export const analyzeName = (name: string): LexicalSignals => ({
  length: codePointLength(name),
  hasDigits: hasDigits(name),
  hasHyphen: hasHyphen(name),
  allLetters: isAllLetters(name),
  mixedCase: hasMixedCase(name),
})
