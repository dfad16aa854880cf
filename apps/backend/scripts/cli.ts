// Shared argv handling for the operator scripts.
import process from 'node:process'

export type ArgMap = Record<string, string>

export function parseArgs(argv: string[]): ArgMap {
  const out: ArgMap = {}
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token || !token.startsWith('--')) continue
    const key = token.slice(2)
    const next = argv[i + 1]
    if (next && !next.startsWith('--')) {
      out[key] = next
      i += 1
    } else {
      out[key] = 'true'
    }
  }
  return out
}

export function requireArg(args: ArgMap, key: string, usage: string): string {
  const value = args[key]
  if (!value || value === 'true') {
    console.error(`Missing --${key}\n${usage}`)
    process.exit(1)
  }
  return value
}

export function optionalInt(args: ArgMap, key: string): number | null {
  const value = args[key]
  if (value === undefined) return null
  const n = Number(value)
  if (!Number.isInteger(n)) {
    console.error(`--${key} must be an integer, got "${value}"`)
    process.exit(1)
  }
  return n
}
