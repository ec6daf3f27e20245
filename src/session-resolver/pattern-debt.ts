import { SKIP, type SelectionMatrix } from '../rules-config/rules-config.types'
import { PatternExhaustionError, RulesConfigError } from './session-resolver.errors'
import type { BiologicalState, MovementPattern, PatternRank } from './session-resolver.types'

export const MS_PER_DAY = 24 * 60 * 60 * 1000

export type Debt<P extends string> = {
  pattern: P
  lastTrainedIso: string | null
  debtMs: number // +Infinity = never trained
}

export type AnchorSelection = {
  pattern: MovementPattern
  exerciseName: string
}

/**
 * Elapsed time since the last session of each pattern. Future timestamps
 * produce negative debt and are kept as-is.
 */
export function computeDebts<P extends string>(
  history: Partial<Record<P, string | null>>,
  now: Date,
  patterns: readonly P[],
): Debt<P>[] {
  return patterns.map((pattern) => {
    const lastTrainedIso = history[pattern] ?? null
    if (lastTrainedIso === null) {
      return { pattern, lastTrainedIso, debtMs: Number.POSITIVE_INFINITY }
    }

    const lastMs = Date.parse(lastTrainedIso)
    if (!Number.isFinite(lastMs)) {
      throw new RangeError(`Invalid last-trained timestamp for ${pattern}: ${lastTrainedIso}`)
    }
    return { pattern, lastTrainedIso, debtMs: now.getTime() - lastMs }
  })
}

/**
 * Highest debt first; equal debts (including several never-trained
 * patterns) fall back to the position in `priority`.
 */
export function rankByDebt<P extends string>(debts: readonly Debt<P>[], priority: readonly P[]): Debt<P>[] {
  const rank = (pattern: P) => {
    const idx = priority.indexOf(pattern)
    return idx >= 0 ? idx : priority.length
  }

  // Infinity - Infinity is NaN, so compare instead of subtracting
  return [...debts].sort((a, b) => {
    if (a.debtMs !== b.debtMs) return a.debtMs > b.debtMs ? -1 : 1
    return rank(a.pattern) - rank(b.pattern)
  })
}

export function toPatternRanking(ranking: readonly Debt<MovementPattern>[]): PatternRank[] {
  return ranking.map((d) => ({
    pattern: d.pattern,
    lastTrainedIso: d.lastTrainedIso,
    daysSince: Number.isFinite(d.debtMs) ? Math.floor(d.debtMs / MS_PER_DAY) : null,
  }))
}

/**
 * Walks the ranking until a pattern has a MAIN lift for the state.
 * SKIP falls through to the next pattern; a missing entry is a config defect.
 */
export function resolveAnchorPattern(
  ranking: readonly Debt<MovementPattern>[],
  state: BiologicalState,
  selections: SelectionMatrix,
): AnchorSelection {
  for (const { pattern } of ranking) {
    const choice = selections[pattern]?.['MAIN']?.[state]
    if (choice === undefined) {
      throw new RulesConfigError(`No MAIN selection for ${pattern} in state ${state}`, {
        pattern,
        tier: 'MAIN',
        state,
      })
    }
    if (choice === SKIP) continue
    return { pattern, exerciseName: choice }
  }

  throw new PatternExhaustionError(`Every main pattern is SKIP for state ${state}`, {
    state,
    ranking: ranking.map((d) => d.pattern),
  })
}

/** Core sub-pattern with the highest debt; null when no core patterns are configured */
export function selectCorePattern(
  corePatterns: readonly string[],
  coreLastTrained: Record<string, string | null>,
  now: Date,
): string | null {
  const [first] = rankByDebt(computeDebts(coreLastTrained, now, corePatterns), corePatterns)
  return first?.pattern ?? null
}
