import { Injectable } from '@nestjs/common'
import type {
  ConditioningHistory,
  ConditioningLevels,
  ConditioningProtocol,
  CoreHistory,
  MovementPattern,
  PatternHistory,
  PushPlane,
} from '../session-resolver/session-resolver.types'

export type CompletedSession = {
  completedAtIso: string
  anchorPattern: MovementPattern
  conditioningProtocol: ConditioningProtocol | null
  corePattern: string | null
  notes: string | null
}

export type BenchmarkResult = {
  watts: number
  recordedAtIso: string
}

export type AthleteState = {
  userId: string
  lastTrained: PatternHistory
  conditioningLevels: ConditioningLevels
  conditioningLastPerformed: ConditioningHistory
  latestBenchmark: BenchmarkResult | null
  coreLastTrained: CoreHistory
  lastPushPlane: PushPlane | null
  pendingPushPlane: PushPlane | null // from the last generated recovery plan, applied on completion
  completions: CompletedSession[] // newest last
  updatedAtIso: string | null
}

export const ATHLETE_STATE_STORE = Symbol('ATHLETE_STATE_STORE')

export interface AthleteStateStore {
  get(userId: string): AthleteState
  save(state: AthleteState): void
}

export function emptyAthleteState(userId: string): AthleteState {
  return {
    userId,
    lastTrained: {},
    conditioningLevels: {},
    conditioningLastPerformed: {},
    latestBenchmark: null,
    coreLastTrained: {},
    lastPushPlane: null,
    pendingPushPlane: null,
    completions: [],
    updatedAtIso: null,
  }
}

/**
 * Process-local snapshots keyed by user id. Copies on the way in and out,
 * so callers never share references with the map.
 */
@Injectable()
export class InMemoryAthleteStateStore implements AthleteStateStore {
  private readonly states = new Map<string, AthleteState>()

  get(userId: string): AthleteState {
    const state = this.states.get(userId)
    return state ? structuredClone(state) : emptyAthleteState(userId)
  }

  save(state: AthleteState): void {
    this.states.set(state.userId, structuredClone(state))
  }
}
