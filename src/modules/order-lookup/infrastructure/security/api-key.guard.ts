import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { timingSafeEqual } from 'node:crypto';
import type { Request } from 'express';
import { gatewayConfig, type GatewayConfig } from '../../../../common/config/gateway.config';
import { createLogger } from '../../../../common/utils/logger';

export const API_KEY_HEADER = 'x-api-key';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = createLogger(ApiKeyGuard.name);

  constructor(@Inject(gatewayConfig.KEY) private readonly config: GatewayConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const providedKey = request.header(API_KEY_HEADER);

    if (!providedKey || !secureEquals(providedKey, this.config.apiKey)) {
      this.logger.auth('api_key_rejected', {
        event: 'api_key_rejected',
        request_id: request.requestId,
        reason: providedKey ? 'mismatch' : 'missing',
      });
      throw new UnauthorizedException();
    }

    return true;
  }
}

function secureEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);

  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}
