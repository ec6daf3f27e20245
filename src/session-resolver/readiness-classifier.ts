import type { Thresholds } from '../rules-config/rules-config.types'
import type { Archetype, BiologicalState, ReadinessInput } from './session-resolver.types'

const STATE_RANK: Record<BiologicalState, number> = { RED: 0, ORANGE: 1, GREEN: 2 }

const clampScore = (value: number): number => Math.min(10, Math.max(0, value))

// Pain: lower is better
export function painState(pain: number, thresholds: Thresholds['pain']): BiologicalState {
  const score = clampScore(pain)
  if (score >= thresholds.redMin) return 'RED'
  if (score <= thresholds.greenMax) return 'GREEN'
  return 'ORANGE'
}

// Energy: higher is better
export function energyState(energy: number, thresholds: Thresholds['energy']): BiologicalState {
  const score = clampScore(energy)
  if (score <= thresholds.redMax) return 'RED'
  if (score >= thresholds.greenMin) return 'GREEN'
  return 'ORANGE'
}

export function worstState(a: BiologicalState, b: BiologicalState): BiologicalState {
  return STATE_RANK[a] <= STATE_RANK[b] ? a : b
}

export function classifyReadiness(readiness: ReadinessInput, thresholds: Thresholds): BiologicalState {
  return worstState(painState(readiness.pain, thresholds.pain), energyState(readiness.energy, thresholds.energy))
}

export function archetypeFor(state: BiologicalState): Archetype {
  return state === 'RED' ? 'RECOVERY' : 'PERFORMANCE'
}
