/**
 * Millisecond clock. Injected wherever expiry is computed so tests can drive time.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function secondsToMs(seconds: number): number {
    return seconds * 1000;
}
