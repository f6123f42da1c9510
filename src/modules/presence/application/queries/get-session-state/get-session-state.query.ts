import { TypedQuery } from '@/modules/shared/cqrs';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { ActiveSessionRegistry } from '@/modules/presence/infrastructure/active-session/active-session.registry';
import { ActiveSessionSnapshot } from '@/modules/presence/domain/active-session/active-session';

export type GetSessionStateQueryProps = {
  correlationId: string;
};

export class GetSessionStateQuery extends TypedQuery<ActiveSessionSnapshot> {
  constructor(public readonly props: GetSessionStateQueryProps) {
    super();
  }
}

@QueryHandler(GetSessionStateQuery)
export class GetSessionStateQueryHandler
  implements IQueryHandler<GetSessionStateQuery>
{
  constructor(private readonly sessionRegistry: ActiveSessionRegistry) {}

  async execute(_query: GetSessionStateQuery): Promise<ActiveSessionSnapshot> {
    return this.sessionRegistry.runExclusive((session) => session.snapshot());
  }
}
