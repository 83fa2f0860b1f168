import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
} from '@nestjs/websockets';
import { Server } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import { MessageView } from '../../utils/types';

export type TurnEvent =
  | { event: 'turn.state'; data: { sessionId: string; state: string } }
  | { event: 'turn.completed'; data: { sessionId: string; messages: MessageView[] } }
  | { event: 'turn.failed'; data: { sessionId: string; error: string } };

// the part of a socket.io Socket this gateway uses
export interface SessionSocket {
  id: string;
  handshake: { auth: Record<string, unknown>; query: Record<string, unknown> };
  join(room: string): Promise<void> | void;
  emit(event: string, payload: unknown): boolean;
}

/**
 * Pushes turn progress to clients watching a session. A client joins the
 * room of the `sessionId` it passes in the handshake auth or query.
 */
@WebSocketGateway({ cors: { origin: '*' } })
@Injectable()
export class SocketGateway implements OnGatewayConnection {
  private readonly logger = new Logger(SocketGateway.name);

  @WebSocketServer()
  public server?: Server;

  async handleConnection(client: SessionSocket) {
    const { auth, query } = client.handshake;

    const sessionId = this.parseString(auth.sessionId ?? query.sessionId);
    if (!sessionId) {
      client.emit('connection:ack', { socketId: client.id, sessionId: null });
      return;
    }

    await client.join(sessionId);
    client.emit('connection:ack', { socketId: client.id, sessionId });
  }

  emitToSession(sessionId: string, turnEvent: TurnEvent) {
    if (!this.server) {
      // no transport bound, e.g. in an HTTP-only test app
      return;
    }
    this.server.to(sessionId).emit(turnEvent.event, turnEvent.data);
    this.logger.verbose(`${turnEvent.event} -> ${sessionId}`);
  }

  private parseString(value: unknown): string | undefined {
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    return undefined;
  }
}
