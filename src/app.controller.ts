import { Controller, Get, Inject } from '@nestjs/common'
import { RULES_CONFIG } from './rules-config/rules-config.module'
import type { RulesConfig } from './rules-config/rules-config.types'

@Controller()
export class AppController {
  constructor(@Inject(RULES_CONFIG) private readonly config: RulesConfig) {}

  @Get()
  getRoot() {
    return { status: 'ok', service: 'Session Resolver API' }
  }

  @Get('health')
  health() {
    return {
      status: 'ok',
      rules: {
        exercises: this.config.library.catalog.length,
        patternPriority: this.config.logic.patternPriority,
      },
    }
  }
}
