export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function nowIso(clock: Clock = systemClock): string {
  return clock().toISOString();
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function minutesToSeconds(minutes: number): number {
  return Math.round(minutes * 60);
}

export function daysToSeconds(days: number): number {
  return Math.round(days * 86_400);
}
