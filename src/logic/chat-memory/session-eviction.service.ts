import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AppEnv } from '../../utils/env';
import { SessionStore } from './session-store';
import { TurnLockService } from './turn-lock.service';

export const SESSION_EVICTION_INTERVAL = 'session-eviction';

@Injectable()
export class SessionEvictionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionEvictionService.name);
  private readonly idleTtlMs: number;
  private readonly sweepIntervalMs: number;

  constructor(
    private readonly sessionStore: SessionStore,
    private readonly turnLock: TurnLockService,
    private readonly schedulerRegistry: SchedulerRegistry,
    configService: ConfigService<AppEnv, true>,
  ) {
    this.idleTtlMs = configService.get('SESSION_IDLE_TTL_MS', { infer: true });
    this.sweepIntervalMs = configService.get('SESSION_SWEEP_INTERVAL_MS', { infer: true });
  }

  get enabled(): boolean {
    return this.idleTtlMs > 0;
  }

  onModuleInit() {
    if (!this.enabled) {
      return;
    }
    const interval = setInterval(() => this.sweep(), this.sweepIntervalMs);
    interval.unref();
    this.schedulerRegistry.addInterval(SESSION_EVICTION_INTERVAL, interval);
    this.logger.log(`Evicting sessions idle for more than ${this.idleTtlMs} ms`);
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', SESSION_EVICTION_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(SESSION_EVICTION_INTERVAL);
    }
  }

  sweep(now = Date.now()): string[] {
    if (!this.enabled) {
      return [];
    }
    const evicted = this.sessionStore.sweepIdle(now - this.idleTtlMs, (sessionId) => this.turnLock.isLocked(sessionId));
    if (evicted.length > 0) {
      this.logger.log(`Evicted ${evicted.length} idle session(s)`);
    }
    return evicted;
  }
}
