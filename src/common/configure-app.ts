import helmet from 'helmet';
import cookieParser = require('cookie-parser');
import compression = require('compression');
import * as express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppConfigService } from '../modules/app/app-config.service';
import { ApiResponseInterceptor } from './interceptors/api-response.interceptor';
import { ApiExceptionFilter } from './filters/api-exception.filter';
import { requestIdMiddleware } from './request-id';
import { sessionCookieMiddleware } from './session-cookie';

/** HTTP pipeline shared by the server entrypoint and e2e tests. Order matters. */
export function configureApp(app: NestExpressApplication): void {
  const logger = new Logger('HTTP');
  const appConfig = app.get(AppConfigService);

  // Generated content must never be conditionally cached.
  app.disable('etag');

  // Security headers. The page has no scripts; helmet's default CSP allows its inline styles.
  // upgrade-insecure-requests would rewrite the form POST to https on plain-http deployments.
  app.use(helmet({ contentSecurityPolicy: { directives: { upgradeInsecureRequests: null } } }));
  app.use(compression());

  app.use(express.json({ limit: '32kb' }));
  app.use(express.urlencoded({ extended: true, limit: '32kb' }));

  app.use(cookieParser());
  app.use(requestIdMiddleware());
  app.use(sessionCookieMiddleware(appConfig.sessionCookie()));

  // Dev-only: lightweight request logging (opt-in via LOG_REQUESTS=true).
  if (!appConfig.isProd() && appConfig.logRequests()) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        const rid = String(res.getHeader('x-request-id') ?? '');
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${rid ? ` rid=${rid}` : ''}`);
      });
      next();
    });
  }

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
}
