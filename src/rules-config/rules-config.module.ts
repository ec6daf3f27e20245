import { Global, Logger, Module } from '@nestjs/common'
import { resolve } from 'path'
import { loadRulesConfig } from './rules-config.loader'
import type { RulesConfig } from './rules-config.types'

export const RULES_CONFIG = Symbol('RULES_CONFIG')

export function getRulesConfigDir(): string {
  const raw = process.env.RULES_CONFIG_DIR
  return raw && raw.trim().length > 0 ? resolve(raw) : resolve(process.cwd(), 'config')
}

@Global()
@Module({
  providers: [
    {
      provide: RULES_CONFIG,
      useFactory: (): RulesConfig => {
        const logger = new Logger('RulesConfig')
        const dir = getRulesConfigDir()
        const config = loadRulesConfig(dir)
        logger.log(
          `Loaded rules from ${dir}: ${config.library.catalog.length} exercises, ` +
            `priority ${config.logic.patternPriority.join('>')}, rotation ${config.conditioning.rotation.join('/')}`,
        )
        return config
      },
    },
  ],
  exports: [RULES_CONFIG],
})
export class RulesConfigModule {}
