import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Req,
} from "@nestjs/common";
import { Request } from "express";
import { EnqueueFailedError } from "../../common/errors/delivery.errors";
import { StatusPublisherService } from "../../infra/services/status-publisher.service";
import { StatusWebhookAck, StatusWebhookDto } from "../dtos/status-webhook.dto";

const WEBHOOK_SOURCE = "webhook";

/**
 * Receipts from channel connectors. The update is only queued here; the
 * status consumer decides whether the transition is legal.
 */
@Controller("webhooks")
export class StatusWebhookController {
  constructor(private readonly publisher: StatusPublisherService) {}

  @Post("status")
  @HttpCode(HttpStatus.ACCEPTED)
  async receive(
    @Body() body: StatusWebhookDto,
    @Req() req: Request,
  ): Promise<StatusWebhookAck> {
    const published = await this.publisher.publish(body.messageId, body.status, {
      source: body.source ?? WEBHOOK_SOURCE,
      errorMessage: body.errorMessage,
      correlationId: req.correlationId,
      timestamp: body.timestamp,
    });
    if (!published) {
      throw new EnqueueFailedError("status stream unavailable");
    }
    return { messageId: body.messageId, status: body.status, queued: true };
  }
}
