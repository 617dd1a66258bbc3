import { sleep } from "./retry";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export function unixSeconds(clock: Pick<Clock, "now"> = systemClock): number {
  return Math.floor(clock.now() / 1000);
}
