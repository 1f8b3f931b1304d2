import { OperatorExecutionError, SourceLocation } from '../errors';
import type { Individual } from '../species/species.individual';

/** Sources concatenated in order. */
export function* merge(sources: readonly Iterable<Individual>[]): Generator<Individual> {
  for (const source of sources) yield* source;
}

/**
 * Runs `create` lazily and attributes any failure, whether raised while building
 * the operator's iterable or while pulling from it, to `operator`. Failures
 * already attributed upstream pass through unchanged.
 */
export function* guarded(
  operator: string,
  location: SourceLocation,
  create: () => Iterable<Individual>
): Generator<Individual> {
  const attribute = (error: unknown): OperatorExecutionError =>
    error instanceof OperatorExecutionError
      ? error
      : new OperatorExecutionError(operator, location, error);

  let iterator: Iterator<Individual>;
  try {
    iterator = create()[Symbol.iterator]();
  } catch (error) {
    throw attribute(error);
  }
  try {
    for (;;) {
      let step: IteratorResult<Individual>;
      try {
        step = iterator.next();
      } catch (error) {
        throw attribute(error);
      }
      if (step.done) return;
      yield step.value;
    }
  } finally {
    iterator.return?.();
  }
}

/** Pull up to `count` items. */
export function take<T>(iterator: Iterator<T>, count: number): T[] {
  const taken: T[] = [];
  while (taken.length < count) {
    const step = iterator.next();
    if (step.done) break;
    taken.push(step.value);
  }
  return taken;
}

/** Pull everything that is left. */
export function drainIterator<T>(iterator: Iterator<T>): T[] {
  const rest: T[] = [];
  for (;;) {
    const step = iterator.next();
    if (step.done) return rest;
    rest.push(step.value);
  }
}
