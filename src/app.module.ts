import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { ClockModule } from './clock/clock.module'
import { RulesConfigModule } from './rules-config/rules-config.module'
import { SessionsModule } from './sessions/sessions.module'

@Module({
  imports: [ClockModule, RulesConfigModule, SessionsModule],
  controllers: [AppController],
})
export class AppModule {}
