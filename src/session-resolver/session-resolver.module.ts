import { Module } from '@nestjs/common'
import { SessionResolverService } from './session-resolver.service'

@Module({
  providers: [SessionResolverService],
  exports: [SessionResolverService],
})
export class SessionResolverModule {}
