import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { TypedCommandBus } from '@/modules/shared/cqrs';
import { ShutdownCommand } from '../commands/shutdown/shutdown.command';

/**
 * Runs the shutdown bookkeeping on every orderly exit (signal or
 * `/api/quit`), before the scheduler and HTTP server are torn down.
 */
@Injectable()
export class PresenceLifecycle implements BeforeApplicationShutdown {
  private readonly logger = new Logger(PresenceLifecycle.name);

  constructor(private readonly commandBus: TypedCommandBus) {}

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    try {
      await this.commandBus.execute(
        new ShutdownCommand({ correlationId: randomUUID() }),
      );
    } catch (error) {
      // the process is going down either way; let the remaining hooks run
      this.logger.error({ err: error, signal }, 'Shutdown bookkeeping failed');
    }
  }
}
