import type { PracticeConfig, StatsAggregate } from './types';

/**
 * Starting goal for the next session. Only the historical best moves it up;
 * failed sessions count too, since digitsAchieved is recorded either way.
 */
export function computeStartDigits(
  aggregate: Pick<StatsAggregate, 'bestDigitsAchieved'>,
  config: Pick<PracticeConfig, 'minDigits' | 'maxDigits'>,
): number {
  const best = Math.max(0, Math.trunc(aggregate.bestDigitsAchieved));
  return Math.min(Math.max(config.minDigits, best), config.maxDigits);
}
