import type { Clock } from '../types';

export const systemClock: Clock = {
  now: () => Date.now()
};

// Clock that only moves when told to
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

// mm:ss (minutes are not capped)
export function formatClock(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${pad2(minutes)}:${pad2(seconds)}`;
}

// mm:ss.d with tenths
export function formatPreciseClock(ms: number): string {
  const clamped = Math.max(0, ms);
  const tenths = Math.floor((clamped % 1000) / 100);
  return `${formatClock(clamped)}.${tenths}`;
}
