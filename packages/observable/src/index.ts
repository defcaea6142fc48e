import { Observable } from "rxjs";

export { take, toArray, firstValueFrom } from "rxjs";

export class SimpleObservable<T> extends Observable<T> {
  /**
   * Wraps a lazy iterable. Values are pulled one at a time and only while
   * the subscriber is still open, so `take(n)` or an early unsubscribe stops
   * the underlying iterator instead of draining it.
   */
  static fromLazy<T>(source: Iterable<T>): SimpleObservable<T> {
    return new SimpleObservable<T>((subscriber) => {
      const iterator = source[Symbol.iterator]();
      let done = false;
      try {
        while (!subscriber.closed) {
          const step = iterator.next();
          if (step.done) {
            done = true;
            subscriber.complete();
            break;
          }
          subscriber.next(step.value);
        }
      } catch (err) {
        done = true;
        subscriber.error(err);
      }
      return () => {
        if (!done) iterator.return?.();
      };
    });
  }
}
