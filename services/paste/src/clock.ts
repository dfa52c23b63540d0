import type { Clock, Nanos } from './types';
import { NANOS_PER_MILLISECOND, NANOS_PER_SECOND } from './types';

// wall-clock anchor taken once; hrtime keeps successive readings monotonic
const anchorWall = BigInt(Date.now()) * NANOS_PER_MILLISECOND;
const anchorMono = process.hrtime.bigint();

export const systemClock: Clock = () => anchorWall + (process.hrtime.bigint() - anchorMono);

export function secondsToNanos(seconds: number | bigint): Nanos {
  return BigInt(seconds) * NANOS_PER_SECOND;
}
