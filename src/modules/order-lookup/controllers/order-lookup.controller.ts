import { Controller, Get, HttpStatus, Query, Req, Res, UseGuards } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { Request, Response } from 'express';
import { LookupOrderUseCase } from '../application/use-cases/lookup-order';
import { OrderLookupQueryDto } from '../dto/order-lookup-query.dto';
import type { OrderLookupResponse } from '../dto/order-lookup-response.dto';
import { ApiKeyGuard } from '../infrastructure/security/api-key.guard';

@Controller()
export class OrderLookupController {
  constructor(private readonly lookupOrder: LookupOrderUseCase) {}

  @Get('order-lookup')
  @UseGuards(ApiKeyGuard)
  async lookup(
    @Req() request: Request,
    @Query() query: OrderLookupQueryDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<OrderLookupResponse> {
    const result = await this.lookupOrder.execute({
      requestId: request.requestId ?? randomUUID(),
      orderId: query.order_id,
      customerEmail: query.customer_email,
    });

    if (result.kind === 'not_found') {
      response.status(HttpStatus.NOT_FOUND);
      return { context: result.context };
    }

    return {
      context: result.context,
      tracking_url: result.trackingUrl,
    };
  }
}
