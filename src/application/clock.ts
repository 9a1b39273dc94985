/** Current time in floating-point seconds since the Unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;
