import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
} from "@nestjs/common";
import { Request } from "express";
import {
  AcceptedMessage,
  MessageAcceptanceService,
  MessageStatusView,
} from "../services/message-acceptance.service";

/**
 * Message ingress
 *
 * POST /messages - validate, record PENDING, enqueue; 202 Accepted
 * GET /messages/:messageId/status - current status and transition history
 *
 * Response (POST):
 * {
 *   messageId: string,
 *   status: "PENDING",
 *   acceptedAt: ISO timestamp
 * }
 *
 * Later transitions arrive on the live stream (`message.status`).
 */
@Controller("messages")
export class MessagesController {
  constructor(private readonly acceptance: MessageAcceptanceService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async accept(
    @Body() body: unknown,
    @Req() req: Request,
  ): Promise<AcceptedMessage> {
    return this.acceptance.accept(body, req.correlationId);
  }

  @Get(":messageId/status")
  async status(@Param("messageId") messageId: string): Promise<MessageStatusView> {
    return this.acceptance.status(messageId);
  }
}
