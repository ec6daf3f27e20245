import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  Post,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { SessionResolverService } from '../session-resolver/session-resolver.service'
import { CompleteSessionDto } from './dto/complete-session.dto'
import { GenerateSessionDto } from './dto/generate-session.dto'
import { SessionsService } from './sessions.service'

// No authentication: callers without x-user-id share this identity
export const DEFAULT_USER_ID = '00000000-0000-0000-0000-000000000000'

@Controller()
export class SessionsController {
  constructor(
    private readonly sessionsService: SessionsService,
    private readonly sessionResolverService: SessionResolverService,
  ) {}

  private getUserId(header?: string): string {
    const userId = header?.trim()
    return userId ? userId : DEFAULT_USER_ID
  }

  @Get('rules')
  getRules() {
    return this.sessionResolverService.getRules()
  }

  @Get('state')
  getState(@Headers('x-user-id') userIdHeader?: string) {
    return this.sessionsService.getState(this.getUserId(userIdHeader))
  }

  @Post('sessions/generate')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  generate(@Headers('x-user-id') userIdHeader: string | undefined, @Body() body: GenerateSessionDto) {
    return this.sessionsService.generate(this.getUserId(userIdHeader), body)
  }

  @Post('sessions/complete')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  complete(@Headers('x-user-id') userIdHeader: string | undefined, @Body() body: CompleteSessionDto) {
    return this.sessionsService.complete(this.getUserId(userIdHeader), body)
  }
}
