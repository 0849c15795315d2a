/**
 * Source of "now" in epoch milliseconds. Injected wherever expiry is computed.
 */
export type Clock = () => number;

export const nowMs: Clock = () => Date.now();

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}

export function daysToMs(days: number): number {
  return days * 24 * 60 * 60 * 1000;
}
