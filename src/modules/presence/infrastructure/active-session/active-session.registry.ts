import { Injectable } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { ActiveSession } from '../../domain/active-session/active-session';

/**
 * Owns the process-wide ActiveSession. Every access goes through
 * `runExclusive`, so a check-then-flip-then-log sequence is one critical
 * section even when requests interleave at await points.
 */
@Injectable()
export class ActiveSessionRegistry {
  private readonly session = new ActiveSession();
  private readonly mutex = new Mutex();

  runExclusive<T>(work: (session: ActiveSession) => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(() => work(this.session));
  }
}
