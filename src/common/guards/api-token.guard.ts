import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'crypto';

/**
 * Bearer-token check against `API_TOKEN`.
 *
 * Open mode is an explicit switch: with no token configured the guard only
 * lets requests through when `AUTH_DISABLED=true`, and refuses to be
 * constructed otherwise so the application fails at startup.
 */
@Injectable()
export class ApiTokenGuard implements CanActivate {
  private readonly logger = new Logger(ApiTokenGuard.name);
  private readonly apiToken: string | undefined;

  constructor(private readonly configService: ConfigService) {
    const token = this.configService.get<string>('API_TOKEN');
    this.apiToken = token ? token : undefined;
    const authDisabled = this.configService.get<boolean>('AUTH_DISABLED', false);

    if (!this.apiToken && !authDisabled) {
      throw new Error(
        'No API_TOKEN configured; set one or start with AUTH_DISABLED=true',
      );
    }
    if (!this.apiToken) {
      this.logger.warn('Authentication disabled (AUTH_DISABLED=true)');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.apiToken) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match || !this.tokensMatch(match[1], this.apiToken)) {
      throw new UnauthorizedException('Invalid or missing API token');
    }
    return true;
  }

  private tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
