/**
 * Command base carrying its handler's result type, so that
 * `TypedCommandBus.execute` returns a typed promise.
 */
export abstract class TypedCommand<TResult> {
  declare readonly _resultType?: TResult;
}
