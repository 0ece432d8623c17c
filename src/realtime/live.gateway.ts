import { Injectable, Logger } from "@nestjs/common";
import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  WebSocketGateway,
} from "@nestjs/websockets";
import { Socket } from "socket.io";
import { StructuredLogger } from "../common/logging/structured-logger";
import { getEnv } from "../config/environment";
import { LiveFanoutRegistry } from "./live-fanout.registry";

function firstString(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  if (typeof candidate !== "string") {
    return undefined;
  }
  const trimmed = candidate.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Origins are read when a handshake arrives, not when this module loads, so
 * the gateway follows CORS_ORIGINS like the HTTP routes do.
 */
export function allowLiveOrigins(
  _requestOrigin: string | undefined,
  callback: (err: Error | null, origin?: string[]) => void,
): void {
  callback(null, [...getEnv().service.corsOrigins]);
}

/**
 * socket.io entry point for live streams.
 *
 * Clients connect to `/live` with `auth: { userId }` (or `?userId=`). Every
 * socket is one session of that user's stream; events arrive under their
 * type name (`message.status`, `message.new`).
 */
@WebSocketGateway({
  namespace: "/live",
  cors: {
    origin: allowLiveOrigins,
    credentials: true,
  },
})
@Injectable()
export class LiveGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(LiveGateway.name);

  constructor(private readonly liveFanout: LiveFanoutRegistry) {}

  afterInit(): void {
    this.logger.log("Live gateway initialized");
  }

  handleConnection(client: Socket): void {
    const userId = this.resolveUserId(client);
    if (!userId) {
      client.emit("error", { message: "Missing userId for live connection" });
      client.disconnect(true);
      return;
    }

    this.liveFanout.register(userId, {
      sessionId: client.id,
      send: (event) => {
        client.emit(event.type, event);
      },
    });

    StructuredLogger.info("live.connection", {
      status: "connected",
      data: {
        userId,
        socketId: client.id,
        sessionCount: this.liveFanout.sessionCount(userId),
      },
    });
  }

  handleDisconnect(client: Socket): void {
    const userId = this.resolveUserId(client);
    if (!userId) {
      return;
    }

    this.liveFanout.deregister(userId, client.id);

    StructuredLogger.info("live.connection", {
      status: "disconnected",
      data: {
        userId,
        socketId: client.id,
        sessionCount: this.liveFanout.sessionCount(userId),
      },
    });
  }

  resolveUserId(client: Socket): string | undefined {
    const auth: unknown = client.handshake.auth;
    const fromAuth =
      typeof auth === "object" && auth !== null && "userId" in auth
        ? firstString(auth.userId)
        : undefined;
    return fromAuth ?? firstString(client.handshake.query.userId);
  }
}
