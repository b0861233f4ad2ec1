export const PERIODS = ['overall', '7day', '1month', '3month', '6month', '12month'] as const;

export type Period = typeof PERIODS[number];

export function isPeriod(value: string): value is Period {
  return PERIODS.some(period => period === value);
}
