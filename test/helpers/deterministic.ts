import { Clock, RandomSource } from '../../src/common/utils';

/**
 * Random source that replays the given values in a loop
 */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

export interface SteppingClock {
  clock: Clock;
  calls(): number;
}

/**
 * Clock that advances by stepMs on every read, starting at startMs
 */
export function steppingClock(startMs: number, stepMs: number = 1000): SteppingClock {
  let calls = 0;
  return {
    clock: () => new Date(startMs + stepMs * calls++),
    calls: () => calls
  };
}
