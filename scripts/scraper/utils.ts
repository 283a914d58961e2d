import { logger } from './logger';
import { DelayRange, ProgressEvent, ProgressFn } from './types';
import { errorMessage } from './errors';

export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export const sleep: Sleep = (ms: number) => new Promise((res) => setTimeout(res, ms));

export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
  return min + (max - min) * random();
}

/** Inclusive integer in [min, max]. */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

export function jitter(range: DelayRange, random: RandomSource = Math.random): number {
  return Math.round(randomBetween(range.min, range.max, random));
}

export type Progress = (message: string) => ProgressEvent;

export function createProgress(callback?: ProgressFn): Progress {
  return (message: string) => {
    const event: ProgressEvent = { message, timestamp: new Date().toISOString() };
    if (callback) {
      try {
        callback(message);
      } catch (err) {
        logger.warn('Progress callback threw', { error: errorMessage(err) });
      }
    }
    return event;
  };
}

const NA = /^n\/a$/i;

export function cleanText(value: string | null | undefined): string {
  const trimmed = (value ?? '').trim();
  return NA.test(trimmed) ? '' : trimmed;
}
