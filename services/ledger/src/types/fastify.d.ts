import type { RouteHandlerMethod } from 'fastify';

import type { User } from '../domain/models';
import type { ValidationHandler, ValidationSchemas } from '../plugins/validation';
import type { AuthService } from '../services/auth-service';
import type { MilkRecordsService } from '../services/milk-records-service';
import type { SettingsService } from '../services/settings-service';
import type { TokenService } from '../services/token-service';

declare module 'fastify' {
  interface FastifyInstance {
    authService: AuthService;
    tokenService: TokenService;
    milkRecordsService: MilkRecordsService;
    settingsService: SettingsService;
    withValidation<T extends ValidationSchemas>(
      schemas: T,
      handler: ValidationHandler<T>,
    ): RouteHandlerMethod;
    withAuth(handler: RouteHandlerMethod): RouteHandlerMethod;
    authenticate(request: FastifyRequest): Promise<User>;
  }

  interface FastifyRequest {
    authUser: User | null;
    validated: Record<string, unknown>;
  }
}
