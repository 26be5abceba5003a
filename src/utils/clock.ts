// src/utils/clock.ts

/** Wall-clock time in whole unix seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
