import {
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from "class-validator";
import { MessageStatus } from "../../infra/queue/message-event.interface";

/**
 * Delivery/read receipt reported by a channel connector.
 */
export class StatusWebhookDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  messageId!: string;

  @IsEnum(MessageStatus)
  status!: MessageStatus;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  errorMessage?: string;

  /** Connector name; defaults to `webhook` */
  @IsOptional()
  @IsString()
  @MaxLength(100)
  source?: string;

  @IsOptional()
  @IsISO8601()
  timestamp?: string;
}

export interface StatusWebhookAck {
  readonly messageId: string;
  readonly status: MessageStatus;
  readonly queued: true;
}
