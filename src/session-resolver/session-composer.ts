import {
  SKIP,
  type BlockComponent,
  type RulesConfig,
} from '../rules-config/rules-config.types'
import {
  currentLevel,
  resolveConditioningLevel,
  selectConditioningProtocol,
  targetWatts,
} from './conditioning-progression'
import type { AnchorSelection } from './pattern-debt'
import { RulesConfigError } from './session-resolver.errors'
import type {
  Archetype,
  BiologicalState,
  ConditioningHistory,
  ConditioningLevels,
  Exercise,
  PushPlane,
  SessionBlock,
} from './session-resolver.types'

export type ComposeContext = {
  state: BiologicalState
  archetype: Archetype
  anchor: AnchorSelection
  conditioningLevels: ConditioningLevels
  conditioningLastPerformed: ConditioningHistory
  benchmarkWatts: number | null
  corePattern: string | null
  lastPushPlane: PushPlane | null
  now: Date
}

const CORE = 'CORE'

/** Selection matrix lookup; null for SKIP, RulesConfigError for a missing entry */
export function lookupSelection(
  config: RulesConfig,
  pattern: string,
  tier: string,
  state: BiologicalState,
): string | null {
  const choice = config.selections[pattern]?.[tier]?.[state]
  if (choice === undefined) {
    throw new RulesConfigError(`No selection for ${pattern}:${tier} in state ${state}`, { pattern, tier, state })
  }
  return choice === SKIP ? null : choice
}

/** Copies tracking metadata from the library entry, untouched */
export function toExercise(config: RulesConfig, name: string, pattern?: string, tier?: string): Exercise {
  const entry = config.library.catalog.find((e) => e.name === name)
  if (!entry) {
    throw new RulesConfigError(`Exercise "${name}" is not in the library`, { name })
  }
  return {
    name,
    ...(pattern !== undefined && { pattern }),
    ...(tier !== undefined && { tier }),
    isUnilateral: entry.settings.unilateral,
    trackingUnit: entry.settings.unit,
    loadType: entry.settings.load,
  }
}

function selectionExercises(
  config: RulesConfig,
  pattern: string,
  tier: string,
  state: BiologicalState,
): Exercise[] {
  const name = lookupSelection(config, pattern, tier, state)
  return name === null ? [] : [toExercise(config, name, pattern, tier)]
}

// Last recovery push VERTICAL -> HORIZONTAL push + VERTICAL pull today, otherwise the reverse
export function recoveryPlanes(lastPushPlane: PushPlane | null): { push: PushPlane; pull: PushPlane } {
  return lastPushPlane === 'VERTICAL'
    ? { push: 'HORIZONTAL', pull: 'VERTICAL' }
    : { push: 'VERTICAL', pull: 'HORIZONTAL' }
}

function conditioningExercise(config: RulesConfig, ctx: ComposeContext, component: { protocol?: Exercise['protocol'] }): Exercise {
  const protocol =
    component.protocol ??
    selectConditioningProtocol(ctx.state, ctx.conditioningLastPerformed, ctx.now, config.conditioning)
  const resolved = resolveConditioningLevel(protocol, currentLevel(ctx.conditioningLevels, protocol), config.conditioning)
  const watts = targetWatts(resolved.targetModifier, ctx.benchmarkWatts)

  return {
    name: `${config.conditioning.equipment} - ${protocol} (Level ${resolved.level})`,
    pattern: 'CONDITIONING',
    tier: protocol,
    isUnilateral: false,
    trackingUnit: config.conditioning.trackingUnit,
    loadType: 'BODYWEIGHT',
    isConditioning: true,
    protocol,
    level: resolved.level,
    rounds: resolved.rounds,
    workSeconds: resolved.workSeconds,
    restSeconds: resolved.restSeconds,
    targetIntensity: resolved.targetIntensity,
    description: resolved.description,
    ...(resolved.isBenchmark !== undefined && { isBenchmark: resolved.isBenchmark }),
    ...(resolved.targetModifier !== undefined && { targetModifier: resolved.targetModifier }),
    ...(watts !== null && { targetWatts: watts }),
  }
}

function resolveComponent(component: BlockComponent, ctx: ComposeContext, config: RulesConfig): Exercise[] {
  const { state, anchor } = ctx

  switch (component.kind) {
    case 'selection':
      return selectionExercises(config, component.pattern, component.tier, state)

    case 'core':
      return ctx.corePattern === null ? [] : selectionExercises(config, CORE, ctx.corePattern, state)

    case 'power': {
      const powerType = config.logic.powerSelection[state]
      if (powerType === SKIP) return []
      const options = config.logic.powerOptions[powerType]
      if (!options) {
        throw new RulesConfigError(`No power options for type ${powerType}`, { state, powerType })
      }
      return options.map((name) => toExercise(config, name, 'POWER', powerType))
    }

    case 'main':
      return [toExercise(config, anchor.exerciseName, anchor.pattern, 'MAIN')]

    case 'relatedAccessories':
      return config.logic.relationships[anchor.pattern].flatMap((slot) =>
        selectionExercises(config, slot.pattern, slot.tier, state),
      )

    case 'conditioning':
      return [conditioningExercise(config, ctx, component)]

    case 'mobilityFlow':
      return config.sessions.RECOVERY.mobilityFlow.map((name) => toExercise(config, name, 'MOBILITY'))

    case 'repairIsometrics':
      return config.sessions.RECOVERY.repairIsometrics.map((iso) => ({
        ...toExercise(config, iso.name, 'ISOMETRIC'),
        holdSeconds: iso.holdSeconds,
        rounds: iso.rounds,
      }))

    case 'balancedAccessories': {
      const planes = recoveryPlanes(ctx.lastPushPlane)
      return [
        ...selectionExercises(config, 'PUSH', `ACCESSORY_${planes.push}`, component.state),
        ...selectionExercises(config, 'PULL', `ACCESSORY_${planes.pull}`, component.state),
      ]
    }
  }
}

/** Plane of the push accessory actually prescribed on a RECOVERY day */
export function recoveryPushPlane(
  archetype: ComposeContext['archetype'],
  blocks: readonly SessionBlock[],
): PushPlane | null {
  if (archetype !== 'RECOVERY') return null
  for (const block of blocks) {
    if (block.type !== 'ACCESSORY') continue
    for (const exercise of block.exercises) {
      if (exercise.pattern !== 'PUSH') continue
      if (exercise.tier === 'ACCESSORY_VERTICAL') return 'VERTICAL'
      if (exercise.tier === 'ACCESSORY_HORIZONTAL') return 'HORIZONTAL'
    }
  }
  return null
}

/**
 * Walks the archetype's block templates in order. PERFORMANCE and RECOVERY
 * are separate templates, not one template with substitutions. A block that
 * ends up empty because every slot was SKIP is left out.
 */
export function composeSession(ctx: ComposeContext, config: RulesConfig): SessionBlock[] {
  const blocks: SessionBlock[] = []

  for (const template of config.sessions[ctx.archetype].blocks) {
    const exercises = template.components.flatMap((component) => resolveComponent(component, ctx, config))

    if (template.perExercise) {
      exercises.forEach((exercise, idx) => {
        blocks.push({ type: template.type, label: `${template.label} ${idx + 1}`, exercises: [exercise] })
      })
    } else if (exercises.length > 0) {
      blocks.push({ type: template.type, label: template.label, exercises })
    }
  }

  return blocks
}
