import { FileUpload, Session } from '../../entities';

/**
 * Registry of sessions by id. The only component allowed to create, reset or
 * drop a Session; everything else gets a Session reference from here.
 */
export abstract class SessionStore {
  abstract getOrCreate(sessionId: string): Session;

  /** Read-only lookup, never creates. */
  abstract snapshot(sessionId: string): Session | undefined;

  abstract reset(sessionId: string): void;

  abstract registerUpload(sessionId: string, file: FileUpload): void;

  /**
   * Drops sessions whose last activity is older than `cutoff` and for which
   * `isBusy` is false. Returns the evicted ids.
   */
  abstract sweepIdle(cutoff: number, isBusy: (sessionId: string) => boolean): string[];

  abstract size(): number;
}
