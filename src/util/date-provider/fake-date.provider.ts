import { Injectable } from '@nestjs/common';
import { OsDateProvider } from './os-date.provider';

/**
 * Date provider with a settable clock. Calendar arithmetic is delegated to
 * the real implementation so tests exercise the same local-time rules.
 */
@Injectable()
export class FakeDateProvider extends OsDateProvider {
  private _now: Date = new Date();

  setNow(now: Date): void {
    this._now = now;
  }

  advanceBy(milliseconds: number): void {
    this._now = new Date(this._now.getTime() + milliseconds);
  }

  override now(): Date {
    return this._now;
  }
}
