import { createHash } from 'crypto'
import stringify from 'fast-json-stable-stringify'
import type { RulesConfig } from '../rules-config/rules-config.types'
import { archetypeFor, classifyReadiness } from './readiness-classifier'
import { computeDebts, rankByDebt, resolveAnchorPattern, selectCorePattern, toPatternRanking } from './pattern-debt'
import { composeSession, recoveryPushPlane } from './session-composer'
import type {
  ComposeOptions,
  ConditioningLevels,
  PatternHistory,
  ReadinessInput,
  SessionPlan,
} from './session-resolver.types'

export { applyCompletion } from './completion-mutator'

/**
 * SHA256 of the stable JSON of everything that determines the plan.
 * Same inputs and same `now` give the same hash.
 */
export function calculateInputsHash(inputs: {
  readiness: ReadinessInput
  lastTrained: PatternHistory
  conditioningLevels: ConditioningLevels
  options: ComposeOptions
  now: Date
}): string {
  const stableJson = stringify({
    readiness: inputs.readiness,
    lastTrained: inputs.lastTrained,
    conditioningLevels: inputs.conditioningLevels,
    coreLastTrained: inputs.options.coreLastTrained ?? {},
    lastPushPlane: inputs.options.lastPushPlane ?? null,
    conditioningLastPerformed: inputs.options.conditioningLastPerformed ?? {},
    benchmarkWatts: inputs.options.benchmarkWatts ?? null,
    nowIso: inputs.now.toISOString(),
  })
  return createHash('sha256').update(stableJson).digest('hex')
}

/**
 * Readiness -> state -> archetype, debt ranking -> anchor, then the
 * archetype's template filled from the rules. Pure: nothing is read from
 * the environment and `now` is always passed in.
 */
export function classifyAndCompose(
  readiness: ReadinessInput,
  lastTrained: PatternHistory,
  conditioningLevels: ConditioningLevels,
  config: RulesConfig,
  now: Date,
  options: ComposeOptions = {},
): SessionPlan {
  const { logic } = config

  const state = classifyReadiness(readiness, logic.thresholds)
  const archetype = archetypeFor(state)

  const ranking = rankByDebt(computeDebts(lastTrained, now, logic.patternPriority), logic.patternPriority)
  const anchor = resolveAnchorPattern(ranking, state, config.selections)
  const corePattern = selectCorePattern(logic.corePatterns, options.coreLastTrained ?? {}, now)

  const blocks = composeSession(
    {
      state,
      archetype,
      anchor,
      conditioningLevels,
      conditioningLastPerformed: options.conditioningLastPerformed ?? {},
      benchmarkWatts: options.benchmarkWatts ?? null,
      corePattern,
      lastPushPlane: options.lastPushPlane ?? null,
      now,
    },
    config,
  )

  return {
    generatedAtIso: now.toISOString(),
    inputsHash: calculateInputsHash({ readiness, lastTrained, conditioningLevels, options, now }),
    state,
    archetype,
    anchorPattern: anchor.pattern,
    patternRanking: toPatternRanking(ranking),
    blocks,
    recoveryPushPlane: recoveryPushPlane(archetype, blocks),
  }
}
