export type BiologicalState = 'GREEN' | 'ORANGE' | 'RED'

export type Archetype = 'PERFORMANCE' | 'RECOVERY'

export type MovementPattern = 'SQUAT' | 'HINGE' | 'PUSH' | 'PULL'

export type ConditioningProtocol = 'HIIT' | 'SIT' | 'SS'

export type PushPlane = 'VERTICAL' | 'HORIZONTAL'

export type BlockType = 'PREP' | 'POWER' | 'MAIN' | 'ACCESSORY' | 'ISOMETRIC' | 'CONDITIONING'

export type TrackingUnit = 'REPS' | 'SECS' | 'DISTANCE' | 'WEIGHT' | 'WATTS' | 'CHECKLIST'

export type LoadType = 'WEIGHTED' | 'BODYWEIGHT'

export type ReadinessInput = {
  pain: number // 0-10
  energy: number // 0-10
}

/** ISO last-trained instant per pattern; null or missing = never trained */
export type PatternHistory = Partial<Record<MovementPattern, string | null>>

/** Keyed by configured core sub-pattern (TRANSVERSE, SAGITTAL, ...) */
export type CoreHistory = Record<string, string | null>

/** Missing protocol = level 1 */
export type ConditioningLevels = Partial<Record<ConditioningProtocol, number>>

/** ISO instant each protocol was last performed; null or missing = never */
export type ConditioningHistory = Partial<Record<ConditioningProtocol, string | null>>

export type Exercise = {
  name: string
  pattern?: string
  tier?: string
  isUnilateral: boolean
  trackingUnit: TrackingUnit
  loadType: LoadType

  // conditioning
  isConditioning?: boolean
  protocol?: ConditioningProtocol
  level?: number
  workSeconds?: number
  restSeconds?: number
  targetIntensity?: string
  description?: string
  isBenchmark?: boolean
  targetModifier?: string // BENCHMARK_<multiplier>
  targetWatts?: number // latest benchmark x multiplier

  // conditioning + timed holds
  rounds?: number
  holdSeconds?: number
}

export type SessionBlock = {
  type: BlockType
  label: string
  exercises: Exercise[]
}

export type PatternRank = {
  pattern: MovementPattern
  lastTrainedIso: string | null
  daysSince: number | null // null = never trained
}

export type SessionPlan = {
  generatedAtIso: string
  inputsHash: string // sha256 of stable JSON of the inputs
  state: BiologicalState
  archetype: Archetype
  anchorPattern: MovementPattern
  patternRanking: PatternRank[]
  blocks: SessionBlock[]
  recoveryPushPlane: PushPlane | null // plane of the recovery push accessory, null on PERFORMANCE days
}

export type ComposeOptions = {
  coreLastTrained?: CoreHistory
  lastPushPlane?: PushPlane | null
  conditioningLastPerformed?: ConditioningHistory
  benchmarkWatts?: number | null
}

export type CompletionInput = {
  lastTrained: PatternHistory
  conditioningLevels: ConditioningLevels
  anchorPattern: MovementPattern
  completedConditioningProtocol?: ConditioningProtocol | null
  conditioningLastPerformed?: ConditioningHistory
  coreLastTrained?: CoreHistory
  completedCorePattern?: string | null
  now: Date
}

export type CompletionResult = {
  lastTrained: PatternHistory
  conditioningLevels: ConditioningLevels
  conditioningLastPerformed: ConditioningHistory
  coreLastTrained: CoreHistory
}
