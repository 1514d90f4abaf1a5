/**
 * Time source. Engines take `now` explicitly; the clock supplies it at the
 * edges (HTTP handlers, scheduler, default record creation).
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
