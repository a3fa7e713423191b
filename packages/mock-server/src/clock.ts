/**
 * Microsecond clock that never repeats a reading.
 */

export type Clock = () => number;

/**
 * Wrap a time source so successive readings strictly increase, even when the
 * source stalls or runs backwards.
 */
export function createClock(source: Clock = () => Date.now() * 1000): Clock {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    const reading = Math.max(source(), last + 1);
    last = reading;
    return reading;
  };
}
