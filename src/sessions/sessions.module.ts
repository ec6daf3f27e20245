import { Module } from '@nestjs/common'
import { SessionResolverModule } from '../session-resolver/session-resolver.module'
import { ATHLETE_STATE_STORE, InMemoryAthleteStateStore } from './athlete-state.store'
import { SessionsController } from './sessions.controller'
import { SessionsService } from './sessions.service'

@Module({
  imports: [SessionResolverModule],
  providers: [SessionsService, { provide: ATHLETE_STATE_STORE, useClass: InMemoryAthleteStateStore }],
  controllers: [SessionsController],
})
export class SessionsModule {}
