import { Injectable } from '@nestjs/common';
import { SessionBusyError } from '../../utils/errors';

export type LockMode = 'queue' | 'reject';

/**
 * Serializes work per session id. Each id has its own promise chain, so a
 * slow turn in one session never holds up another session.
 */
@Injectable()
export class TurnLockService {
  private readonly tails = new Map<string, Promise<void>>();

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  /**
   * Runs `task` once every earlier task for the same id has settled. In
   * `reject` mode a held lock fails fast with SessionBusyError instead.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>, mode: LockMode = 'queue'): Promise<T> {
    const previous = this.tails.get(sessionId);
    if (previous && mode === 'reject') {
      return Promise.reject(new SessionBusyError(sessionId));
    }

    const run = (previous ?? Promise.resolve()).then(task);
    // registered before the caller sees `run`, so the entry is gone by the time an awaiter resumes
    const release = () => {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    };
    const tail: Promise<void> = run.then(release, release);
    this.tails.set(sessionId, tail);
    return run;
  }
}
