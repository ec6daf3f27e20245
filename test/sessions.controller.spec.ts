import { BadRequestException, ValidationPipe } from '@nestjs/common'
import { Test } from '@nestjs/testing'
import { join } from 'path'
import { CLOCK } from '../src/clock/clock'
import type { Clock } from '../src/clock/clock'
import { loadRulesConfig } from '../src/rules-config/rules-config.loader'
import { RULES_CONFIG } from '../src/rules-config/rules-config.module'
import { SessionResolverService } from '../src/session-resolver/session-resolver.service'
import { ATHLETE_STATE_STORE, InMemoryAthleteStateStore } from '../src/sessions/athlete-state.store'
import { CompleteSessionDto } from '../src/sessions/dto/complete-session.dto'
import { GenerateSessionDto, PatternHistoryDto } from '../src/sessions/dto/generate-session.dto'
import { DEFAULT_USER_ID, SessionsController } from '../src/sessions/sessions.controller'
import { SessionsService } from '../src/sessions/sessions.service'

describe('SessionsController', () => {
  const config = loadRulesConfig(join(__dirname, '../config'))
  let now: Date
  let controller: SessionsController

  beforeEach(async () => {
    now = new Date('2025-03-10T12:00:00.000Z')
    const clock: Clock = { now: () => now }

    const mod = await Test.createTestingModule({
      controllers: [SessionsController],
      providers: [
        SessionsService,
        SessionResolverService,
        { provide: ATHLETE_STATE_STORE, useClass: InMemoryAthleteStateStore },
        { provide: RULES_CONFIG, useValue: config },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile()

    controller = mod.get(SessionsController)
  })

  it('GET /state returns an empty snapshot for a new user', () => {
    const state = controller.getState(undefined)

    expect(state).toMatchObject({
      userId: DEFAULT_USER_ID,
      lastTrained: {},
      conditioningLevels: {},
      conditioningLastPerformed: {},
      latestBenchmark: null,
      lastPushPlane: null,
      pendingPushPlane: null,
      completions: [],
      updatedAtIso: null,
    })
    expect(state.readiness.SQUAT).toEqual({ lastTrainedIso: null, daysSince: null, status: 'Fully Primed' })
  })

  it('GET /rules returns the loaded config', () => {
    expect(controller.getRules()).toBe(config)
  })

  it('POST /sessions/generate uses request history when given', () => {
    const lastTrained: PatternHistoryDto = {
      SQUAT: '2025-03-02T12:00:00.000Z',
      HINGE: '2025-03-09T12:00:00.000Z',
      PUSH: '2025-03-09T12:00:00.000Z',
      PULL: '2025-03-09T12:00:00.000Z',
    }
    const plan = controller.generate('athlete-1', { pain: 2, energy: 8, lastTrained })

    expect(plan.state).toBe('GREEN')
    expect(plan.anchorPattern).toBe('SQUAT')
  })

  it('completion feeds the stored snapshot used by the next generation', () => {
    const afterComplete = controller.complete(undefined, {
      anchorPattern: 'SQUAT',
      completedConditioningProtocol: 'SIT',
      completedCorePattern: 'TRANSVERSE',
      notes: 'felt good',
    })

    expect(afterComplete.lastTrained).toEqual({ SQUAT: '2025-03-10T12:00:00.000Z' })
    expect(afterComplete.conditioningLevels).toEqual({ SIT: 2 })
    expect(afterComplete.coreLastTrained).toEqual({ TRANSVERSE: '2025-03-10T12:00:00.000Z' })
    expect(afterComplete.completions).toEqual([
      {
        completedAtIso: '2025-03-10T12:00:00.000Z',
        anchorPattern: 'SQUAT',
        conditioningProtocol: 'SIT',
        corePattern: 'TRANSVERSE',
        notes: 'felt good',
      },
    ])
    expect(afterComplete.readiness.SQUAT?.status).toBe('Fatigued')

    now = new Date('2025-03-11T12:00:00.000Z')
    const plan = controller.generate(undefined, { pain: 2, energy: 8 })

    expect(plan.anchorPattern).toBe('HINGE')
    expect(plan.blocks[0]?.exercises.map((e) => e.name)).toEqual(['Spanish Squat Hold', 'Ab Wheel Rollout'])
    expect(plan.blocks[plan.blocks.length - 1]?.exercises[0]?.name).toBe('Assault Bike - HIIT (Level 1)')
  })

  it('keeps users apart', () => {
    controller.complete('athlete-1', { anchorPattern: 'PUSH' })

    expect(controller.getState('athlete-1').lastTrained).toEqual({ PUSH: '2025-03-10T12:00:00.000Z' })
    expect(controller.getState('athlete-2').lastTrained).toEqual({})
  })

  it('remembers the push plane of a recovery day', () => {
    controller.complete(undefined, { anchorPattern: 'PUSH', completedConditioningProtocol: 'SS', pushPlane: 'VERTICAL' })

    const plan = controller.generate(undefined, { pain: 8, energy: 5 })
    const pump = plan.blocks.filter((b) => b.type === 'ACCESSORY').map((b) => b.exercises[0]?.name)

    expect(plan.archetype).toBe('RECOVERY')
    expect(pump).toEqual(['Push-up', 'Lat Pulldown'])
    expect(controller.getState(undefined).conditioningLevels).toEqual({})
  })

  it('takes the push plane from the generated recovery plan when none is sent', () => {
    const redDay = controller.generate(undefined, { pain: 8, energy: 5 })
    expect(redDay.anchorPattern).toBe('PUSH')
    expect(redDay.recoveryPushPlane).toBe('VERTICAL')
    expect(redDay.blocks.filter((b) => b.type === 'ACCESSORY').map((b) => b.exercises[0]?.name)).toEqual([
      'Half-Kneeling Landmine Press',
      'Cable Row',
    ])

    const state = controller.complete(undefined, { anchorPattern: 'PUSH', completedConditioningProtocol: 'SS' })
    expect(state.lastPushPlane).toBe('VERTICAL')
    expect(state.pendingPushPlane).toBeNull()
    expect(state.conditioningLastPerformed).toEqual({ SS: '2025-03-10T12:00:00.000Z' })

    now = new Date('2025-03-11T12:00:00.000Z')
    const nextRedDay = controller.generate(undefined, { pain: 8, energy: 5 })
    expect(nextRedDay.anchorPattern).toBe('PULL')
    expect(nextRedDay.recoveryPushPlane).toBe('HORIZONTAL')
    expect(nextRedDay.blocks.filter((b) => b.type === 'ACCESSORY').map((b) => b.exercises[0]?.name)).toEqual([
      'Push-up',
      'Lat Pulldown',
    ])
  })

  it('a performance plan generated later leaves the push plane alone', () => {
    controller.generate(undefined, { pain: 8, energy: 5 })
    controller.generate(undefined, { pain: 2, energy: 8 })

    const state = controller.complete(undefined, { anchorPattern: 'SQUAT' })
    expect(state.lastPushPlane).toBeNull()
  })

  it('the client push plane overrides the generated one', () => {
    controller.generate(undefined, { pain: 8, energy: 5 })

    const state = controller.complete(undefined, { anchorPattern: 'PUSH', pushPlane: 'HORIZONTAL' })
    expect(state.lastPushPlane).toBe('HORIZONTAL')
  })

  it('stores a benchmark result and derives conditioning targets from it', () => {
    const state = controller.complete(undefined, {
      anchorPattern: 'SQUAT',
      completedConditioningProtocol: 'SIT',
      benchmarkWatts: 800,
    })
    expect(state.latestBenchmark).toEqual({ watts: 800, recordedAtIso: '2025-03-10T12:00:00.000Z' })

    now = new Date('2025-03-11T12:00:00.000Z')
    const plan = controller.generate(undefined, { pain: 2, energy: 8 })
    const conditioning = plan.blocks.find((b) => b.type === 'CONDITIONING')?.exercises[0]
    expect(conditioning?.name).toBe('Assault Bike - HIIT (Level 1)')
    expect(conditioning?.targetModifier).toBe('BENCHMARK_0.6')
    expect(conditioning?.targetWatts).toBe(480)

    const overridden = controller.generate(undefined, { pain: 2, energy: 8, benchmarkWatts: 500 })
    expect(overridden.blocks.find((b) => b.type === 'CONDITIONING')?.exercises[0]?.targetWatts).toBe(300)

    // a later completion without a result keeps the stored benchmark
    expect(controller.complete(undefined, { anchorPattern: 'HINGE' }).latestBenchmark?.watts).toBe(800)
  })

  it('rejects an unknown core pattern in the request', () => {
    expect(() => controller.generate(undefined, { pain: 2, energy: 8, coreLastTrained: { DIAGONAL: null } })).toThrow(
      BadRequestException,
    )
  })

  describe('validation', () => {
    const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true })

    it('accepts a well-formed generate body', async () => {
      const body = await pipe.transform(
        { pain: 3, energy: 4, lastTrained: { SQUAT: '2025-03-01T08:00:00.000Z', HINGE: null } },
        { type: 'body', metatype: GenerateSessionDto },
      )
      expect(body).toBeInstanceOf(GenerateSessionDto)
    })

    it.each([
      [{ pain: 11, energy: 4 }],
      [{ pain: 3.5, energy: 4 }],
      [{ pain: 3 }],
      [{ pain: 3, energy: 4, mood: 'great' }],
      [{ pain: 3, energy: 4, lastTrained: { SQUAT: 'yesterday' } }],
      [{ pain: 3, energy: 4, lastTrained: { LUNGE: '2025-03-01T08:00:00.000Z' } }],
      [{ pain: 3, energy: 4, conditioningLevels: { SS: 2 } }],
      [{ pain: 3, energy: 4, lastPushPlane: 'DIAGONAL' }],
      [{ pain: 3, energy: 4, conditioningLastPerformed: { SIT: 'last week' } }],
      [{ pain: 3, energy: 4, conditioningLastPerformed: { ROW: '2025-03-01T08:00:00.000Z' } }],
      [{ pain: 3, energy: 4, benchmarkWatts: 0 }],
    ])('rejects generate body %j', async (body) => {
      await expect(pipe.transform(body, { type: 'body', metatype: GenerateSessionDto })).rejects.toBeInstanceOf(
        BadRequestException,
      )
    })

    it('accepts request conditioning history and a benchmark', async () => {
      const body = await pipe.transform(
        { pain: 3, energy: 4, conditioningLastPerformed: { SIT: '2025-03-01T08:00:00.000Z' }, benchmarkWatts: 650 },
        { type: 'body', metatype: GenerateSessionDto },
      )
      expect(body).toMatchObject({ benchmarkWatts: 650, conditioningLastPerformed: { SIT: '2025-03-01T08:00:00.000Z' } })
    })

    it('rejects a completion with a non-positive benchmark', async () => {
      await expect(
        pipe.transform({ anchorPattern: 'SQUAT', benchmarkWatts: -5 }, { type: 'body', metatype: CompleteSessionDto }),
      ).rejects.toBeInstanceOf(BadRequestException)
    })

    it('rejects a completion with an unknown pattern', async () => {
      await expect(
        pipe.transform({ anchorPattern: 'LUNGE' }, { type: 'body', metatype: CompleteSessionDto }),
      ).rejects.toBeInstanceOf(BadRequestException)
    })
  })
})
