import { readFileSync } from 'fs'
import { join } from 'path'
import { RulesConfigError } from '../session-resolver/session-resolver.errors'
import { rulesConfigSchema } from './rules-config.schema'
import type { RulesConfig } from './rules-config.types'

export const RULES_FILES = ['library', 'logic', 'selections', 'sessions', 'conditioning'] as const

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

function readJsonFile(file: string): unknown {
  let text: string
  try {
    text = readFileSync(file, 'utf8')
  } catch (err) {
    throw new RulesConfigError(`Cannot read rules file ${file}`, {
      file,
      cause: err instanceof Error ? err.message : String(err),
    })
  }

  try {
    return JSON.parse(text)
  } catch (err) {
    throw new RulesConfigError(`Rules file ${file} is not valid JSON`, {
      file,
      cause: err instanceof Error ? err.message : String(err),
    })
  }
}

/** Validates an already-parsed rules object and freezes it */
export function parseRulesConfig(raw: unknown): RulesConfig {
  const parsed = rulesConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new RulesConfigError(`Rules config validation failed: ${JSON.stringify(parsed.error.format())}`, {
      issues: parsed.error.issues,
    })
  }
  return deepFreeze(parsed.data)
}

/** Reads library/logic/selections/sessions/conditioning .json from `dir` */
export function loadRulesConfig(dir: string): RulesConfig {
  const raw: Record<string, unknown> = {}
  for (const name of RULES_FILES) {
    raw[name] = readJsonFile(join(dir, `${name}.json`))
  }
  return parseRulesConfig(raw)
}
