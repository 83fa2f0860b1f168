import { Injectable, Logger } from '@nestjs/common';
import { FileUpload, Session } from '../../entities';
import { SessionStore } from './session-store';

/**
 * Process-local session registry. Each id maps to its own Session object, so
 * a reset of one id never touches another id's history or files.
 */
@Injectable()
export class ChatMemoryService extends SessionStore {
  private readonly logger = new Logger(ChatMemoryService.name);
  private readonly sessions = new Map<string, Session>();

  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.touch();
      return existing;
    }
    const session = new Session(sessionId);
    this.sessions.set(sessionId, session);
    this.logger.debug(`Created session ${sessionId}`);
    return session;
  }

  snapshot(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  reset(sessionId: string) {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }
    session.clear();
    this.logger.debug(`Reset session ${sessionId}`);
  }

  registerUpload(sessionId: string, file: FileUpload) {
    this.getOrCreate(sessionId).putFile(file);
  }

  sweepIdle(cutoff: number, isBusy: (sessionId: string) => boolean): string[] {
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (session.lastActivityAt < cutoff && !isBusy(sessionId)) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }
    return evicted;
  }

  size(): number {
    return this.sessions.size;
  }
}
