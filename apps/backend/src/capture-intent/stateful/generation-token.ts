let nextGeneration = 1;

/**
 * Identifies one asynchronous request issued by one state.
 *
 * A token is invalidated when its state is torn down or when the state
 * issues a newer request for the same operation. Completions that arrive
 * with an invalid token are stale and must not cause side effects.
 */
export class GenerationToken {
  readonly generation: number;
  readonly operation: string;
  readonly issuedBy: string;
  private valid = true;

  constructor(operation: string, issuedBy: string) {
    this.generation = nextGeneration++;
    this.operation = operation;
    this.issuedBy = issuedBy;
  }

  isValid(): boolean {
    return this.valid;
  }

  invalidate(): void {
    this.valid = false;
  }

  toString(): string {
    return `${this.issuedBy}:${this.operation}#${this.generation}`;
  }
}
