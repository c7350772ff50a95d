import { LAMPORTS_PER_SOL } from '@solana/web3.js'

export const sol = (lamports: number): string => (lamports / LAMPORTS_PER_SOL).toFixed(4)

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)

export const withTimeout = <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms)
  })
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)

export const firstLabel = (domain: string): string => domain.split('.')[0]

export const suffixOf = (domain: string): string => {
  const parts = domain.split('.')
  if (parts.length < 2) return ''
  return '.' + parts[parts.length - 1].toLowerCase()
}
