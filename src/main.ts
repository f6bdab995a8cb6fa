import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { AppConfigService } from './modules/app/app-config.service';
import { configureApp } from './common/configure-app';

async function bootstrap() {
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  // Keep production logs lean.
  const logLevels: LogLevel[] = isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'];
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger: logLevels });

  const appConfig = app.get(AppConfigService);

  if (!appConfig.gemini()) {
    startup.warn('GEMINI_API_KEY is not set: every request will show the fallback devotional.');
  }

  if (!appConfig.isProd() && appConfig.logStartupInfo()) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `model=${appConfig.gemini()?.model ?? '(unconfigured)'}`,
        `timeZone=${appConfig.devotionalTimeZone()}`,
        `sessionCookieSecure=${appConfig.sessionCookie().secure}`,
      ].join(' | '),
    );
  }

  configureApp(app);
  app.enableShutdownHooks();

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException | undefined)?.code;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use.`);
    } else {
      startup.error(`Failed to start server: ${(err as Error)?.message ?? String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
