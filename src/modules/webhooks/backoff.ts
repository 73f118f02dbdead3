import config from '../../config';

export const DEFAULT_BACKOFF_SCHEDULE_MS: readonly number[] = [1000, 2000, 4000, 8000, 16000];

export function isValidBackoffSchedule(schedule: unknown): schedule is number[] {
  return (
    Array.isArray(schedule) &&
    schedule.length > 0 &&
    schedule.every((delay) => typeof delay === 'number' && Number.isInteger(delay) && delay > 0)
  );
}

/**
 * Schedule used for a subscription: its own override, else the configured default
 */
export function resolveBackoffSchedule(override: number[] | null | undefined): readonly number[] {
  if (isValidBackoffSchedule(override)) return override;
  if (isValidBackoffSchedule(config.webhooks.backoffScheduleMs)) return config.webhooks.backoffScheduleMs;
  return DEFAULT_BACKOFF_SCHEDULE_MS;
}

/**
 * Delay before the next attempt, indexed by the 1-based attempt number just
 * consumed; attempts past the end of the table reuse the last entry.
 */
export function backoffDelayMs(schedule: readonly number[], attempt: number): number {
  const table = schedule.length > 0 ? schedule : DEFAULT_BACKOFF_SCHEDULE_MS;
  const index = Math.min(Math.max(attempt - 1, 0), table.length - 1);
  return table[index];
}
