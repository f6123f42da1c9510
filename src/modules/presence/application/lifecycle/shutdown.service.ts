import { Injectable } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';

/**
 * Lets a request ask the host process to close the application once the
 * response is on its way. `main.ts` subscribes and calls `app.close()`.
 */
@Injectable()
export class ShutdownService {
  private readonly shutdown$ = new Subject<void>();
  private requested = false;

  get requests(): Observable<void> {
    return this.shutdown$.asObservable();
  }

  get isRequested(): boolean {
    return this.requested;
  }

  requestShutdown(delayMs = 100): void {
    if (this.requested) return;
    this.requested = true;
    setTimeout(() => this.shutdown$.next(), delayMs);
  }
}
