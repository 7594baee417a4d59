import { randomUUID } from "node:crypto";

export interface Clock {
  now(): Date;
}

export type IdGenerator = () => string;

export const systemClock: Clock = {
  now: () => new Date()
};

export const randomId: IdGenerator = () => randomUUID();
