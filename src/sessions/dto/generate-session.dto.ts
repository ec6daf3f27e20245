import { Type } from 'class-transformer'
import { IsIn, IsInt, IsISO8601, IsObject, IsOptional, Max, Min, ValidateNested } from 'class-validator'
import type {
  ConditioningHistory,
  ConditioningLevels,
  CoreHistory,
  PatternHistory,
  PushPlane,
} from '../../session-resolver/session-resolver.types'

export const PUSH_PLANES: readonly PushPlane[] = ['VERTICAL', 'HORIZONTAL']

export class PatternHistoryDto implements PatternHistory {
  @IsOptional()
  @IsISO8601({ strict: true })
  SQUAT?: string | null

  @IsOptional()
  @IsISO8601({ strict: true })
  HINGE?: string | null

  @IsOptional()
  @IsISO8601({ strict: true })
  PUSH?: string | null

  @IsOptional()
  @IsISO8601({ strict: true })
  PULL?: string | null
}

export class ConditioningLevelsDto implements ConditioningLevels {
  @IsOptional()
  @IsInt()
  @Min(1)
  HIIT?: number

  @IsOptional()
  @IsInt()
  @Min(1)
  SIT?: number

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1)
  SS?: number
}

export class ConditioningHistoryDto implements ConditioningHistory {
  @IsOptional()
  @IsISO8601({ strict: true })
  HIIT?: string | null

  @IsOptional()
  @IsISO8601({ strict: true })
  SIT?: string | null

  @IsOptional()
  @IsISO8601({ strict: true })
  SS?: string | null
}

export class GenerateSessionDto {
  @IsInt()
  @Min(0)
  @Max(10)
  pain!: number

  @IsInt()
  @Min(0)
  @Max(10)
  energy!: number

  @IsOptional()
  @ValidateNested()
  @Type(() => PatternHistoryDto)
  lastTrained?: PatternHistoryDto

  @IsOptional()
  @ValidateNested()
  @Type(() => ConditioningLevelsDto)
  conditioningLevels?: ConditioningLevelsDto

  @IsOptional()
  @ValidateNested()
  @Type(() => ConditioningHistoryDto)
  conditioningLastPerformed?: ConditioningHistoryDto

  // peak watts of the latest benchmark test
  @IsOptional()
  @IsInt()
  @Min(1)
  benchmarkWatts?: number

  // keys depend on the loaded rules; checked in SessionsService
  @IsOptional()
  @IsObject()
  coreLastTrained?: CoreHistory

  @IsOptional()
  @IsIn(PUSH_PLANES)
  lastPushPlane?: PushPlane
}
