import type { ConditioningConfig, ConditioningLevelSpec } from '../rules-config/rules-config.types'
import { computeDebts, rankByDebt } from './pattern-debt'
import { RulesConfigError } from './session-resolver.errors'
import type {
  BiologicalState,
  ConditioningHistory,
  ConditioningLevels,
  ConditioningProtocol,
} from './session-resolver.types'

export type ResolvedConditioning = ConditioningLevelSpec & {
  protocol: ConditioningProtocol
  level: number
}

const BENCHMARK_MODIFIER = /^BENCHMARK_(\d+(?:\.\d+)?)$/i

export function currentLevel(levels: ConditioningLevels, protocol: ConditioningProtocol): number {
  if (protocol === 'SS') return 1
  return levels[protocol] ?? 1
}

/**
 * RED days always get steady state. Otherwise the rotation protocol
 * performed longest ago is due (never performed first); ties go to the
 * earlier rotation entry. Levels play no part, so a capped protocol keeps
 * its turn in the rotation.
 */
export function selectConditioningProtocol(
  state: BiologicalState,
  lastPerformed: ConditioningHistory,
  now: Date,
  config: ConditioningConfig,
): ConditioningProtocol {
  if (state === 'RED') return 'SS'

  const [due] = rankByDebt(computeDebts(lastPerformed, now, config.rotation), config.rotation)
  if (!due) {
    throw new RulesConfigError('Conditioning rotation is empty', { state })
  }
  return due.pattern
}

export function resolveConditioningLevel(
  protocol: ConditioningProtocol,
  level: number,
  config: ConditioningConfig,
): ResolvedConditioning {
  const protocolConfig = config.protocols[protocol]
  const effectiveLevel = Math.min(level, protocolConfig.maxLevel)
  const levelSpec = protocolConfig.levels[String(effectiveLevel)]
  if (!levelSpec) {
    throw new RulesConfigError(`No level ${effectiveLevel} defined for conditioning protocol ${protocol}`, {
      protocol,
      level: effectiveLevel,
    })
  }
  return { ...levelSpec, protocol, level: effectiveLevel }
}

/** Level after a completed session: +1 up to the protocol's max; SS stays at 1 */
export function progressLevel(protocol: ConditioningProtocol, level: number, config: ConditioningConfig): number {
  if (protocol === 'SS') return 1
  return Math.min(level + 1, config.protocols[protocol].maxLevel)
}

/** `BENCHMARK_1.2` -> 1.2; null when absent or not a benchmark modifier */
export function benchmarkMultiplier(targetModifier: string | undefined): number | null {
  const match = targetModifier ? BENCHMARK_MODIFIER.exec(targetModifier.trim()) : null
  if (!match?.[1]) return null
  const multiplier = Number(match[1])
  return Number.isFinite(multiplier) ? multiplier : null
}

/** Target power for the level, rounded to the watt; null without a modifier or a benchmark */
export function targetWatts(targetModifier: string | undefined, benchmarkWatts: number | null): number | null {
  const multiplier = benchmarkMultiplier(targetModifier)
  if (multiplier === null || benchmarkWatts === null) return null
  return Math.round(benchmarkWatts * multiplier)
}
