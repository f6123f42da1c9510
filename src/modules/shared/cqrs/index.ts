export { TypedCommand } from './typed-command';
export { TypedQuery } from './typed-query';
export { TypedCommandBus } from './typed-command-bus';
export { TypedQueryBus } from './typed-query-bus';
export { TypedCqrsModule } from './cqrs.module';
