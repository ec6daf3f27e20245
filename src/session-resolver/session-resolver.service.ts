import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common'
import { CLOCK } from '../clock/clock'
import type { Clock } from '../clock/clock'
import { RULES_CONFIG } from '../rules-config/rules-config.module'
import type { RulesConfig } from '../rules-config/rules-config.types'
import { applyCompletion, classifyAndCompose } from './session-resolver'
import { SessionResolverError } from './session-resolver.errors'
import { sessionPlanSchema } from './session-plan.schema'
import type {
  CompletionInput,
  CompletionResult,
  ComposeOptions,
  ConditioningLevels,
  PatternHistory,
  ReadinessInput,
  SessionPlan,
} from './session-resolver.types'

@Injectable()
export class SessionResolverService {
  private readonly logger = new Logger(SessionResolverService.name)

  constructor(
    @Inject(RULES_CONFIG) private readonly config: RulesConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  getRules(): RulesConfig {
    return this.config
  }

  generatePlan(
    readiness: ReadinessInput,
    lastTrained: PatternHistory,
    conditioningLevels: ConditioningLevels,
    options: ComposeOptions = {},
  ): SessionPlan {
    const now = this.clock.now()

    let plan: SessionPlan
    try {
      plan = classifyAndCompose(readiness, lastTrained, conditioningLevels, this.config, now, options)
    } catch (err) {
      throw this.toHttpException(err)
    }

    const parsed = sessionPlanSchema.safeParse(plan)
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `SessionPlan validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    this.logger.debug(
      `plan state=${plan.state} archetype=${plan.archetype} anchor=${plan.anchorPattern} hash=${plan.inputsHash}`,
    )
    return parsed.data
  }

  completeSession(input: Omit<CompletionInput, 'now'>): CompletionResult & { completedAtIso: string } {
    const now = this.clock.now()
    try {
      const result = applyCompletion({ ...input, now }, this.config)
      return { ...result, completedAtIso: now.toISOString() }
    } catch (err) {
      throw this.toHttpException(err)
    }
  }

  // Resolver errors are the operator's problem (rules data); RangeError is bad athlete input
  private toHttpException(err: unknown): unknown {
    if (err instanceof SessionResolverError) {
      this.logger.warn(`${err.code}: ${err.message} ${JSON.stringify(err.details)}`)
      return new InternalServerErrorException({
        statusCode: 500,
        error: err.code,
        message: err.message,
        details: err.details,
      })
    }
    if (err instanceof RangeError) {
      return new BadRequestException(err.message)
    }
    return err
  }
}
