/**
 * pg-fluent - Blocking and Yielding Runners
 *
 * Each operation is written once as a generator that yields a Suspension at
 * every driver round trip. runBlocking resolves suspensions through the
 * driver's blocking methods, runYielding awaits their async twins. Faults
 * are thrown back into the generator so its finally blocks release
 * resources in both modes.
 */

export interface Suspension {
  resolveBlocking(): void;
  resolveYielding(signal: AbortSignal): Promise<void>;
}

export type Routine<T> = Generator<Suspension, T, void>;

type Outcome<T> = { settled: false } | { settled: true; value: T };

class RoundTrip<T> implements Suspension {
  private outcome: Outcome<T> = { settled: false };

  constructor(
    private readonly blocking: () => T,
    private readonly yielding: (signal: AbortSignal) => Promise<T>,
    private readonly cancellable: boolean,
  ) {}

  resolveBlocking(): void {
    this.outcome = { settled: true, value: this.blocking() };
  }

  async resolveYielding(signal: AbortSignal): Promise<void> {
    if (this.cancellable) {
      signal.throwIfAborted();
    }
    const value = await this.yielding(signal);
    this.outcome = { settled: true, value };
  }

  value(): T {
    if (!this.outcome.settled) {
      throw new Error("Round trip resumed before it was resolved");
    }
    return this.outcome.value;
  }
}

/**
 * Suspend the routine for one driver round trip
 */
export function* roundTrip<T>(
  blocking: () => T,
  yielding: (signal: AbortSignal) => Promise<T>,
): Routine<T> {
  const trip = new RoundTrip(blocking, yielding, true);
  yield trip;
  return trip.value();
}

/**
 * Round trip that releases a resource. It still runs after the signal has
 * aborted, so owned connections are closed on cancellation too.
 */
export function* release(
  blocking: () => void,
  yielding: () => Promise<void>,
): Routine<void> {
  const trip = new RoundTrip(blocking, () => yielding(), false);
  yield trip;
  trip.value();
}

export function runBlocking<T>(routine: Routine<T>): T {
  let step = routine.next();
  while (!step.done) {
    try {
      step.value.resolveBlocking();
    } catch (error) {
      step = routine.throw(error);
      continue;
    }
    step = routine.next();
  }
  return step.value;
}

export async function runYielding<T>(
  routine: Routine<T>,
  signal: AbortSignal,
): Promise<T> {
  let step = routine.next();
  while (!step.done) {
    try {
      await step.value.resolveYielding(signal);
    } catch (error) {
      step = routine.throw(error);
      continue;
    }
    step = routine.next();
  }
  return step.value;
}

/**
 * Merge the configured signal with the caller's; either one aborts
 */
export function mergeSignals(
  ...signals: (AbortSignal | undefined)[]
): AbortSignal {
  const present = signals.filter(
    (signal): signal is AbortSignal => signal !== undefined,
  );
  const [only] = present;
  if (present.length === 1 && only !== undefined) {
    return only;
  }
  if (present.length === 0) {
    return new AbortController().signal;
  }
  return AbortSignal.any(present);
}
