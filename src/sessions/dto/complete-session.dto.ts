import { IsIn, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator'
import type {
  ConditioningProtocol,
  MovementPattern,
  PushPlane,
} from '../../session-resolver/session-resolver.types'
import { PUSH_PLANES } from './generate-session.dto'

export const MOVEMENT_PATTERNS: readonly MovementPattern[] = ['SQUAT', 'HINGE', 'PUSH', 'PULL']
export const CONDITIONING_PROTOCOLS: readonly ConditioningProtocol[] = ['HIIT', 'SIT', 'SS']

export class CompleteSessionDto {
  @IsIn(MOVEMENT_PATTERNS)
  anchorPattern!: MovementPattern

  @IsOptional()
  @IsIn(CONDITIONING_PROTOCOLS)
  completedConditioningProtocol?: ConditioningProtocol

  @IsOptional()
  @IsString()
  completedCorePattern?: string

  // overrides the push plane of the last generated recovery plan
  @IsOptional()
  @IsIn(PUSH_PLANES)
  pushPlane?: PushPlane

  // peak watts when the session was a benchmark test
  @IsOptional()
  @IsInt()
  @Min(1)
  benchmarkWatts?: number

  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string
}
