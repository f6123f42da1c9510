export abstract class TypedQuery<TResult> {
  declare readonly _resultType?: TResult;
}
