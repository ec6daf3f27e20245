import type { RulesConfig } from '../rules-config/rules-config.types'
import { currentLevel, progressLevel } from './conditioning-progression'
import type {
  CompletionInput,
  CompletionResult,
  ConditioningHistory,
  ConditioningLevels,
  CoreHistory,
  PatternHistory,
} from './session-resolver.types'

/**
 * Next persisted snapshot after a finished session. Only the anchor pattern
 * (and the completed core sub-pattern) is stamped; accessories do not reset
 * their pattern's clock. The completed conditioning protocol is stamped so
 * the rotation moves on. Inputs are copied, never mutated.
 */
export function applyCompletion(input: CompletionInput, config: RulesConfig): CompletionResult {
  const nowIso = input.now.toISOString()

  const lastTrained: PatternHistory = { ...input.lastTrained }
  lastTrained[input.anchorPattern] = nowIso

  const conditioningLevels: ConditioningLevels = { ...input.conditioningLevels }
  if (conditioningLevels.SS !== undefined) conditioningLevels.SS = 1

  const conditioningLastPerformed: ConditioningHistory = { ...input.conditioningLastPerformed }
  const protocol = input.completedConditioningProtocol
  if (protocol) {
    conditioningLastPerformed[protocol] = nowIso
    if (protocol !== 'SS') {
      conditioningLevels[protocol] = progressLevel(
        protocol,
        currentLevel(conditioningLevels, protocol),
        config.conditioning,
      )
    }
  }

  const coreLastTrained: CoreHistory = { ...input.coreLastTrained }
  const corePattern = input.completedCorePattern
  if (corePattern) {
    if (!config.logic.corePatterns.includes(corePattern)) {
      throw new RangeError(`Unknown core pattern: ${corePattern}`)
    }
    coreLastTrained[corePattern] = nowIso
  }

  return { lastTrained, conditioningLevels, conditioningLastPerformed, coreLastTrained }
}
