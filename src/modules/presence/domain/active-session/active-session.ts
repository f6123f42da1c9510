export type ActiveSessionSnapshot = {
  active: boolean;
  startedAt: Date | null;
};

/**
 * The open interval, if any. Mutated only through
 * `ActiveSessionRegistry`, which serializes access.
 */
export class ActiveSession {
  private _startedAt: Date | null = null;

  public get isActive(): boolean {
    return this._startedAt !== null;
  }

  public get startedAt(): Date | null {
    return this._startedAt;
  }

  /**
   * Starts the interval at `now`. Returns false if one was already open.
   */
  public open(now: Date): boolean {
    if (this._startedAt) return false;
    this._startedAt = now;
    return true;
  }

  /**
   * Moves the start of an open interval forward to `to`, once everything
   * before it has been logged. No-op when idle.
   */
  public advanceTo(to: Date): void {
    if (this._startedAt) {
      this._startedAt = to;
    }
  }

  /**
   * Ends the interval and returns its start, or null if none was open.
   */
  public close(): Date | null {
    const startedAt = this._startedAt;
    this._startedAt = null;
    return startedAt;
  }

  public snapshot(): ActiveSessionSnapshot {
    return { active: this.isActive, startedAt: this._startedAt };
  }
}
