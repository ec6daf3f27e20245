import { z } from 'zod'
import type { Exercise, SessionBlock, SessionPlan } from './session-resolver.types'

export const biologicalStateSchema = z.enum(['GREEN', 'ORANGE', 'RED'])
export const movementPatternSchema = z.enum(['SQUAT', 'HINGE', 'PUSH', 'PULL'])
export const conditioningProtocolSchema = z.enum(['HIIT', 'SIT', 'SS'])
export const trackingUnitSchema = z.enum(['REPS', 'SECS', 'DISTANCE', 'WEIGHT', 'WATTS', 'CHECKLIST'])
export const loadTypeSchema = z.enum(['WEIGHTED', 'BODYWEIGHT'])
export const blockTypeSchema = z.enum(['PREP', 'POWER', 'MAIN', 'ACCESSORY', 'ISOMETRIC', 'CONDITIONING'])

const exerciseSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().optional(),
  tier: z.string().optional(),
  isUnilateral: z.boolean(),
  trackingUnit: trackingUnitSchema,
  loadType: loadTypeSchema,
  isConditioning: z.boolean().optional(),
  protocol: conditioningProtocolSchema.optional(),
  level: z.number().int().min(1).optional(),
  workSeconds: z.number().int().min(0).optional(),
  restSeconds: z.number().int().min(0).optional(),
  targetIntensity: z.string().optional(),
  description: z.string().optional(),
  isBenchmark: z.boolean().optional(),
  targetModifier: z.string().optional(),
  targetWatts: z.number().int().min(0).optional(),
  rounds: z.number().int().min(1).optional(),
  holdSeconds: z.number().int().min(1).optional(),
}) satisfies z.ZodType<Exercise>

const sessionBlockSchema = z.object({
  type: blockTypeSchema,
  label: z.string().min(1),
  exercises: z.array(exerciseSchema).min(1),
}) satisfies z.ZodType<SessionBlock>

export const sessionPlanSchema = z
  .object({
    generatedAtIso: z.string().datetime(),
    inputsHash: z.string().length(64).regex(/^[0-9a-f]{64}$/), // 64-char hex
    state: biologicalStateSchema,
    archetype: z.enum(['PERFORMANCE', 'RECOVERY']),
    anchorPattern: movementPatternSchema,
    patternRanking: z.array(
      z.object({
        pattern: movementPatternSchema,
        lastTrainedIso: z.string().nullable(),
        daysSince: z.number().int().nullable(),
      }),
    ),
    blocks: z.array(sessionBlockSchema).min(1),
    recoveryPushPlane: z.enum(['VERTICAL', 'HORIZONTAL']).nullable(),
  })
  .refine((plan) => (plan.state === 'RED') === (plan.archetype === 'RECOVERY'), {
    message: 'RED must map to RECOVERY, GREEN/ORANGE to PERFORMANCE',
  })
  .refine((plan) => plan.archetype === 'RECOVERY' || plan.recoveryPushPlane === null, {
    message: 'recoveryPushPlane is only set on RECOVERY days',
  })
  .refine((plan) => plan.blocks.filter((b) => b.type === 'MAIN').length <= 1, {
    message: 'At most one MAIN block',
  }) satisfies z.ZodType<SessionPlan>
