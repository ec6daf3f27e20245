import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'

function getPort(): number {
  const raw = process.env.PORT
  const parsed = raw ? Number(raw) : NaN
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 3000
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:5173',
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-user-id'],
  })

  const port = getPort()
  await app.listen(port)
  Logger.log(`Listening on port ${port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap')
  process.exit(1)
})
