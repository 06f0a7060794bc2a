import { Clock, HostTime } from './types';

export const NS_PER_MS = 1_000_000n;
export const NS_PER_SECOND = 1_000_000_000n;

export const monotonicClock: Clock = {
    now: (): HostTime => process.hrtime.bigint(),
};

export function toMilliseconds(time: HostTime): number {
    return Number(time / NS_PER_MS);
}
