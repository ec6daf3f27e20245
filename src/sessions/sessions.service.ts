import { BadRequestException, Inject, Injectable } from '@nestjs/common'
import { CLOCK } from '../clock/clock'
import type { Clock } from '../clock/clock'
import { RULES_CONFIG } from '../rules-config/rules-config.module'
import type { RulesConfig } from '../rules-config/rules-config.types'
import { SessionResolverService } from '../session-resolver/session-resolver.service'
import type { CoreHistory, MovementPattern, SessionPlan } from '../session-resolver/session-resolver.types'
import { ATHLETE_STATE_STORE } from './athlete-state.store'
import type { AthleteState, AthleteStateStore } from './athlete-state.store'
import type { CompleteSessionDto } from './dto/complete-session.dto'
import type { GenerateSessionDto } from './dto/generate-session.dto'
import { buildReadinessView } from './readiness-view'
import type { PatternReadiness } from './readiness-view'

const MAX_COMPLETIONS = 50

export type AthleteStateView = AthleteState & {
  readiness: Partial<Record<MovementPattern, PatternReadiness>>
}

@Injectable()
export class SessionsService {
  constructor(
    private readonly sessionResolverService: SessionResolverService,
    @Inject(ATHLETE_STATE_STORE) private readonly store: AthleteStateStore,
    @Inject(RULES_CONFIG) private readonly config: RulesConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  getState(userId: string): AthleteStateView {
    return this.toView(this.store.get(userId))
  }

  /**
   * History parts missing from the request come from the stored snapshot.
   * The recovery push plane of the plan is kept until the session is completed.
   */
  generate(userId: string, dto: GenerateSessionDto): SessionPlan {
    const stored = this.store.get(userId)
    const coreLastTrained = dto.coreLastTrained ?? stored.coreLastTrained
    this.assertCoreHistory(coreLastTrained)

    const plan = this.sessionResolverService.generatePlan(
      { pain: dto.pain, energy: dto.energy },
      dto.lastTrained ?? stored.lastTrained,
      dto.conditioningLevels ?? stored.conditioningLevels,
      {
        coreLastTrained,
        lastPushPlane: dto.lastPushPlane ?? stored.lastPushPlane,
        conditioningLastPerformed: dto.conditioningLastPerformed ?? stored.conditioningLastPerformed,
        benchmarkWatts: dto.benchmarkWatts ?? stored.latestBenchmark?.watts ?? null,
      },
    )

    this.store.save({ ...stored, pendingPushPlane: plan.recoveryPushPlane })
    return plan
  }

  complete(userId: string, dto: CompleteSessionDto): AthleteStateView {
    const stored = this.store.get(userId)

    const result = this.sessionResolverService.completeSession({
      lastTrained: stored.lastTrained,
      conditioningLevels: stored.conditioningLevels,
      conditioningLastPerformed: stored.conditioningLastPerformed,
      anchorPattern: dto.anchorPattern,
      completedConditioningProtocol: dto.completedConditioningProtocol ?? null,
      coreLastTrained: stored.coreLastTrained,
      completedCorePattern: dto.completedCorePattern ?? null,
    })

    const next: AthleteState = {
      ...stored,
      lastTrained: result.lastTrained,
      conditioningLevels: result.conditioningLevels,
      conditioningLastPerformed: result.conditioningLastPerformed,
      latestBenchmark:
        dto.benchmarkWatts !== undefined
          ? { watts: dto.benchmarkWatts, recordedAtIso: result.completedAtIso }
          : stored.latestBenchmark,
      coreLastTrained: result.coreLastTrained,
      lastPushPlane: dto.pushPlane ?? stored.pendingPushPlane ?? stored.lastPushPlane,
      pendingPushPlane: null,
      completions: [
        ...stored.completions,
        {
          completedAtIso: result.completedAtIso,
          anchorPattern: dto.anchorPattern,
          conditioningProtocol: dto.completedConditioningProtocol ?? null,
          corePattern: dto.completedCorePattern ?? null,
          notes: dto.notes ?? null,
        },
      ].slice(-MAX_COMPLETIONS),
      updatedAtIso: result.completedAtIso,
    }

    this.store.save(next)
    return this.toView(next)
  }

  private toView(state: AthleteState): AthleteStateView {
    return {
      ...state,
      readiness: buildReadinessView(state.lastTrained, this.clock.now(), this.config.logic),
    }
  }

  private assertCoreHistory(coreLastTrained: CoreHistory): void {
    for (const [pattern, iso] of Object.entries(coreLastTrained)) {
      if (!this.config.logic.corePatterns.includes(pattern)) {
        throw new BadRequestException(`Unknown core pattern: ${pattern}`)
      }
      if (iso !== null && (typeof iso !== 'string' || !Number.isFinite(Date.parse(iso)))) {
        throw new BadRequestException(`Invalid last-trained timestamp for ${pattern}`)
      }
    }
  }
}
