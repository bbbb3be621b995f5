export type PreparedCallback<TParams extends unknown[], TResult> = (
  ...params: TParams
) => TResult;

export class PreparedStatement<TParams extends unknown[], TResult> {
  constructor(
    readonly name: string,
    private readonly callback: PreparedCallback<TParams, TResult>,
    private readonly onRun: (name: string) => void
  ) {}

  run(...params: TParams): TResult {
    const result = this.callback(...params);
    this.onRun(this.name);
    return result;
  }
}

/**
 * Stand-in for a SQL connection: statements are named callbacks, and every
 * successful run is counted per statement name.
 */
export class InMemoryDatabase {
  private readonly runs = new Map<string, number>();

  prepare<TParams extends unknown[], TResult>(
    statement: string,
    callback: PreparedCallback<TParams, TResult>
  ): PreparedStatement<TParams, TResult> {
    return new PreparedStatement(statement, callback, (name) => {
      this.runs.set(name, (this.runs.get(name) ?? 0) + 1);
    });
  }

  executed(statement: string): number {
    return this.runs.get(statement) ?? 0;
  }
}
