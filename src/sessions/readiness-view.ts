import type { LogicConfig } from '../rules-config/rules-config.types'
import { computeDebts, MS_PER_DAY } from '../session-resolver/pattern-debt'
import type { MovementPattern, PatternHistory } from '../session-resolver/session-resolver.types'

export type ReadinessStatus = 'Fully Primed' | 'Recovering' | 'Fatigued'

export type PatternReadiness = {
  lastTrainedIso: string | null
  daysSince: number | null
  status: ReadinessStatus
}

export function readinessStatus(
  daysSince: number | null,
  windows: LogicConfig['readinessWindows'],
): ReadinessStatus {
  if (daysSince === null || daysSince >= windows.primedFromDays) return 'Fully Primed'
  if (daysSince < windows.fatiguedUnderDays) return 'Fatigued'
  return 'Recovering'
}

/** Per-pattern days since last session and a coarse status for display */
export function buildReadinessView(
  lastTrained: PatternHistory,
  now: Date,
  logic: Pick<LogicConfig, 'patternPriority' | 'readinessWindows'>,
): Partial<Record<MovementPattern, PatternReadiness>> {
  const view: Partial<Record<MovementPattern, PatternReadiness>> = {}
  for (const debt of computeDebts(lastTrained, now, logic.patternPriority)) {
    const daysSince = Number.isFinite(debt.debtMs) ? Math.floor(debt.debtMs / MS_PER_DAY) : null
    view[debt.pattern] = {
      lastTrainedIso: debt.lastTrainedIso,
      daysSince,
      status: readinessStatus(daysSince, logic.readinessWindows),
    }
  }
  return view
}
