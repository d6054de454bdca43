export type FlagValue = string | boolean | string[]

export type ParsedFlags = Record<string, FlagValue>

export interface ParseFlagsOptions {
  /** Flags that may repeat; their values are collected into an array */
  multiple?: readonly string[]
}

export function parseFlags(argv: string[], options: ParseFlagsOptions = {}): ParsedFlags {
  const multiple = new Set(options.multiple ?? [])
  const flags: ParsedFlags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    let key = token.slice(2)
    const valueTokens: string[] = []

    const eq = key.indexOf('=')
    if (eq > 0) {
      valueTokens.push(key.slice(eq + 1))
      key = key.slice(0, eq)
    }

    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }
    i = j - 1

    if (multiple.has(key)) {
      const existing = flags[key]
      const collected = Array.isArray(existing) ? existing : []
      flags[key] = [...collected, ...valueTokens]
      continue
    }

    flags[key] = valueTokens.length > 0 ? valueTokens.join(' ') : true
  }

  return flags
}

export function asString(value: FlagValue | undefined): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

export function asList(value: FlagValue | undefined): string[] | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return undefined
  }
  const parts = (Array.isArray(value) ? value : [value])
    .flatMap(part => part.split(','))
    .map(part => part.trim())
    .filter(Boolean)
  return parts.length > 0 ? parts : undefined
}
