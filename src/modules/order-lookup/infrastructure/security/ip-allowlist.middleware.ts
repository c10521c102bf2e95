import { HttpStatus, Inject, Injectable, type NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { gatewayConfig, type GatewayConfig } from '../../../../common/config/gateway.config';
import { FORBIDDEN_BODY } from '../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../common/utils/logger';

const FORWARDED_FOR_HEADER = 'x-forwarded-for';
const IPV4_MAPPED_PREFIX = '::ffff:';

/**
 * Rejects callers whose address is not allowlisted before any other handling.
 * The first `x-forwarded-for` entry wins over the socket address.
 */
@Injectable()
export class IpAllowlistMiddleware implements NestMiddleware {
  private readonly logger = createLogger(IpAllowlistMiddleware.name);
  private readonly allowedIps: ReadonlySet<string>;

  constructor(@Inject(gatewayConfig.KEY) private readonly config: GatewayConfig) {
    this.allowedIps = new Set(config.ipAllowlist.allowedIps);
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (!this.config.ipAllowlist.enforced) {
      next();
      return;
    }

    const candidateIp = resolveCandidateIp(req);
    if (!this.allowedIps.has(candidateIp)) {
      this.logger.security('ip_not_allowlisted', {
        event: 'ip_not_allowlisted',
        request_id: req.requestId,
        candidate_ip: candidateIp,
        path: req.path,
      });
      res.status(HttpStatus.FORBIDDEN).json(FORBIDDEN_BODY);
      return;
    }

    next();
  }
}

export function resolveCandidateIp(req: Pick<Request, 'header' | 'socket'>): string {
  const chain = (req.header(FORWARDED_FOR_HEADER) ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  const candidate = chain[0] ?? req.socket.remoteAddress ?? '';
  return candidate.startsWith(IPV4_MAPPED_PREFIX)
    ? candidate.slice(IPV4_MAPPED_PREFIX.length)
    : candidate;
}
