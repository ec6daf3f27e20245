import { z } from 'zod'
import {
  biologicalStateSchema,
  blockTypeSchema,
  conditioningProtocolSchema,
  loadTypeSchema,
  movementPatternSchema,
  trackingUnitSchema,
} from '../session-resolver/session-plan.schema'
import { SKIP, type RulesConfig } from './rules-config.types'

const catalogEntrySchema = z.object({
  name: z.string().min(1),
  settings: z.object({
    unilateral: z.boolean(),
    load: loadTypeSchema,
    unit: trackingUnitSchema,
  }),
})

const accessorySlotSchema = z.object({
  pattern: z.string().min(1),
  tier: z.string().min(1),
})

const slotsSchema = z.array(accessorySlotSchema)

const scoreSchema = z.number().int().min(0).max(10)

const logicSchema = z.object({
  thresholds: z.object({
    pain: z.object({ greenMax: scoreSchema, redMin: scoreSchema }),
    energy: z.object({ redMax: scoreSchema, greenMin: scoreSchema }),
  }),
  patternPriority: z.array(movementPatternSchema),
  corePatterns: z.array(z.string().min(1)),
  relationships: z.object({ SQUAT: slotsSchema, HINGE: slotsSchema, PUSH: slotsSchema, PULL: slotsSchema }),
  powerSelection: z.object({ GREEN: z.string(), ORANGE: z.string(), RED: z.string() }),
  powerOptions: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  readinessWindows: z.object({
    fatiguedUnderDays: z.number().min(0),
    primedFromDays: z.number().min(0),
  }),
})

const stateChoicesSchema = z
  .object({ GREEN: z.string().min(1), ORANGE: z.string().min(1), RED: z.string().min(1) })
  .partial()

const selectionsSchema = z.record(z.string(), z.record(z.string(), stateChoicesSchema))

const blockComponentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('selection'), pattern: z.string().min(1), tier: z.string().min(1) }),
  z.object({ kind: z.literal('core') }),
  z.object({ kind: z.literal('power') }),
  z.object({ kind: z.literal('main') }),
  z.object({ kind: z.literal('relatedAccessories') }),
  z.object({ kind: z.literal('conditioning'), protocol: conditioningProtocolSchema.optional() }),
  z.object({ kind: z.literal('mobilityFlow') }),
  z.object({ kind: z.literal('repairIsometrics') }),
  z.object({ kind: z.literal('balancedAccessories'), state: biologicalStateSchema }),
])

const blockTemplateSchema = z.object({
  type: blockTypeSchema,
  label: z.string().min(1),
  perExercise: z.boolean().optional(),
  components: z.array(blockComponentSchema).min(1),
})

const sessionsSchema = z.object({
  PERFORMANCE: z.object({ blocks: z.array(blockTemplateSchema).min(1) }),
  RECOVERY: z.object({
    blocks: z.array(blockTemplateSchema).min(1),
    mobilityFlow: z.array(z.string().min(1)),
    repairIsometrics: z.array(
      z.object({
        name: z.string().min(1),
        holdSeconds: z.number().int().min(1),
        rounds: z.number().int().min(1),
      }),
    ),
  }),
})

const levelSpecSchema = z.object({
  workSeconds: z.number().int().min(1),
  restSeconds: z.number().int().min(0),
  rounds: z.number().int().min(1),
  targetIntensity: z.string().min(1),
  description: z.string().min(1),
  targetModifier: z
    .string()
    .regex(/^BENCHMARK_\d+(\.\d+)?$/i, 'targetModifier must look like BENCHMARK_1.2')
    .optional(),
  isBenchmark: z.boolean().optional(),
})

const protocolSpecSchema = z.object({
  maxLevel: z.number().int().min(1),
  levels: z.record(z.string(), levelSpecSchema),
})

const conditioningSchema = z.object({
  equipment: z.string().min(1),
  trackingUnit: trackingUnitSchema,
  rotation: z.array(conditioningProtocolSchema),
  protocols: z.object({ HIIT: protocolSpecSchema, SIT: protocolSpecSchema, SS: protocolSpecSchema }),
})

/**
 * Shape checks per file, then cross-file checks: every referenced exercise
 * exists in the library, priority is a total order, thresholds do not
 * overlap, conditioning levels are complete.
 */
export const rulesConfigSchema = z
  .object({
    library: z.object({ catalog: z.array(catalogEntrySchema).min(1) }),
    logic: logicSchema,
    selections: selectionsSchema,
    sessions: sessionsSchema,
    conditioning: conditioningSchema,
  })
  .superRefine((config, ctx) => {
    const issue = (message: string, path: (string | number)[]) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path })

    const names = new Set<string>()
    config.library.catalog.forEach((entry, idx) => {
      if (names.has(entry.name)) issue(`Duplicate library entry "${entry.name}"`, ['library', 'catalog', idx, 'name'])
      names.add(entry.name)
    })
    const requireExercise = (name: string, path: (string | number)[]) => {
      if (!names.has(name)) issue(`Exercise "${name}" is not in the library`, path)
    }

    const { logic } = config
    const priority = logic.patternPriority
    if (priority.length !== 4 || new Set(priority).size !== 4) {
      issue('patternPriority must list SQUAT, HINGE, PUSH and PULL exactly once', ['logic', 'patternPriority'])
    }
    if (new Set(logic.corePatterns).size !== logic.corePatterns.length) {
      issue('corePatterns must be unique', ['logic', 'corePatterns'])
    }
    if (logic.thresholds.pain.greenMax >= logic.thresholds.pain.redMin) {
      issue('pain.greenMax must be below pain.redMin', ['logic', 'thresholds', 'pain'])
    }
    if (logic.thresholds.energy.redMax >= logic.thresholds.energy.greenMin) {
      issue('energy.redMax must be below energy.greenMin', ['logic', 'thresholds', 'energy'])
    }
    if (logic.readinessWindows.fatiguedUnderDays > logic.readinessWindows.primedFromDays) {
      issue('fatiguedUnderDays must not exceed primedFromDays', ['logic', 'readinessWindows'])
    }

    for (const [state, powerType] of Object.entries(logic.powerSelection)) {
      if (powerType !== SKIP && !(powerType in logic.powerOptions)) {
        issue(`Unknown power type "${powerType}"`, ['logic', 'powerSelection', state])
      }
    }
    for (const [powerType, options] of Object.entries(logic.powerOptions)) {
      options.forEach((name, idx) => requireExercise(name, ['logic', 'powerOptions', powerType, idx]))
    }

    for (const [pattern, tiers] of Object.entries(config.selections)) {
      for (const [tier, choices] of Object.entries(tiers)) {
        for (const [state, name] of Object.entries(choices)) {
          if (name !== undefined && name !== SKIP) requireExercise(name, ['selections', pattern, tier, state])
        }
      }
    }

    const mainComponents = config.sessions.PERFORMANCE.blocks
      .flatMap((block) => block.components)
      .filter((component) => component.kind === 'main')
    if (mainComponents.length !== 1) {
      issue('PERFORMANCE template must contain exactly one main component', ['sessions', 'PERFORMANCE', 'blocks'])
    }

    const recovery = config.sessions.RECOVERY
    recovery.mobilityFlow.forEach((name, idx) => requireExercise(name, ['sessions', 'RECOVERY', 'mobilityFlow', idx]))
    recovery.repairIsometrics.forEach((iso, idx) =>
      requireExercise(iso.name, ['sessions', 'RECOVERY', 'repairIsometrics', idx, 'name']),
    )

    const { conditioning } = config
    if (conditioning.rotation.length === 0) {
      issue('Conditioning rotation must not be empty', ['conditioning', 'rotation'])
    }
    if (conditioning.rotation.includes('SS')) {
      issue('SS is not part of the rotation', ['conditioning', 'rotation'])
    }
    if (Object.values(conditioning.protocols.SS.levels).some((level) => level.targetModifier !== undefined)) {
      issue('SS levels carry no benchmark target', ['conditioning', 'protocols', 'SS', 'levels'])
    }
    if (conditioning.protocols.SS.maxLevel !== 1) {
      issue('SS maxLevel must be 1', ['conditioning', 'protocols', 'SS', 'maxLevel'])
    }
    for (const [protocol, protocolConfig] of Object.entries(conditioning.protocols)) {
      for (let level = 1; level <= protocolConfig.maxLevel; level++) {
        if (!protocolConfig.levels[String(level)]) {
          issue(`Level ${level} missing for ${protocol}`, ['conditioning', 'protocols', protocol, 'levels'])
        }
      }
    }
  }) satisfies z.ZodType<RulesConfig>
