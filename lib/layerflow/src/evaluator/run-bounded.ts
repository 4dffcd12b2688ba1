import { EMPTY, defer, from, lastValueFrom } from 'rxjs';
import { catchError, mergeMap, toArray } from 'rxjs/operators';

/**
 * Runs `task` for every item with at most `limit` tasks in flight and waits
 * for all started tasks to settle.
 *
 * Fail-fast: after the first failure no further item is started; tasks
 * already running finish, then the first error is thrown.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<unknown>
): Promise<void> {
  const failures: unknown[] = [];

  await lastValueFrom(
    from(items).pipe(
      mergeMap(
        item =>
          failures.length > 0
            ? EMPTY
            : defer(() => task(item)).pipe(
                catchError((error: unknown) => {
                  failures.push(error);
                  return EMPTY;
                })
              ),
        Math.max(1, limit)
      ),
      toArray()
    )
  );

  if (failures.length > 0) {
    throw failures[0];
  }
}
