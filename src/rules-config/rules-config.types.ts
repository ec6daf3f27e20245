import type {
  Archetype,
  BiologicalState,
  BlockType,
  ConditioningProtocol,
  LoadType,
  MovementPattern,
  TrackingUnit,
} from '../session-resolver/session-resolver.types'

export const SKIP = 'SKIP'

export type CatalogEntry = {
  name: string
  settings: {
    unilateral: boolean
    load: LoadType
    unit: TrackingUnit
  }
}

export type LibraryConfig = {
  catalog: CatalogEntry[]
}

export type Thresholds = {
  pain: { greenMax: number; redMin: number } // pain <= greenMax GREEN, >= redMin RED
  energy: { redMax: number; greenMin: number } // energy <= redMax RED, >= greenMin GREEN
}

export type AccessorySlot = {
  pattern: string
  tier: string
}

export type LogicConfig = {
  thresholds: Thresholds
  patternPriority: MovementPattern[]
  corePatterns: string[]
  relationships: Record<MovementPattern, AccessorySlot[]>
  powerSelection: Record<BiologicalState, string>
  powerOptions: Record<string, string[]>
  readinessWindows: { fatiguedUnderDays: number; primedFromDays: number }
}

/** pattern -> tier -> state -> exercise name | SKIP */
export type SelectionMatrix = Record<string, Record<string, Partial<Record<BiologicalState, string>>>>

export type BlockComponent =
  | { kind: 'selection'; pattern: string; tier: string }
  | { kind: 'core' }
  | { kind: 'power' }
  | { kind: 'main' }
  | { kind: 'relatedAccessories' }
  | { kind: 'conditioning'; protocol?: ConditioningProtocol }
  | { kind: 'mobilityFlow' }
  | { kind: 'repairIsometrics' }
  | { kind: 'balancedAccessories'; state: BiologicalState }

export type BlockTemplate = {
  type: BlockType
  label: string
  perExercise?: boolean // one block per resolved exercise, labelled "<label> <n>"
  components: BlockComponent[]
}

export type RepairIsometric = {
  name: string
  holdSeconds: number
  rounds: number
}

export type SessionsConfig = Record<Archetype, { blocks: BlockTemplate[] }> & {
  RECOVERY: {
    mobilityFlow: string[]
    repairIsometrics: RepairIsometric[]
  }
}

export type ConditioningLevelSpec = {
  workSeconds: number
  restSeconds: number
  rounds: number
  targetIntensity: string
  description: string
  targetModifier?: string // BENCHMARK_1.2 = 1.2 x latest benchmark watts
  isBenchmark?: boolean // this level is itself a benchmark test
}

export type ConditioningProtocolSpec = {
  maxLevel: number
  levels: Record<string, ConditioningLevelSpec>
}

export type ConditioningConfig = {
  equipment: string
  trackingUnit: TrackingUnit
  rotation: ConditioningProtocol[]
  protocols: Record<ConditioningProtocol, ConditioningProtocolSpec>
}

export type RulesConfig = {
  library: LibraryConfig
  logic: LogicConfig
  selections: SelectionMatrix
  sessions: SessionsConfig
  conditioning: ConditioningConfig
}
