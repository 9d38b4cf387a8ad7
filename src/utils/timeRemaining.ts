const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Human-readable time left between a reference instant and a deadline
 *
 * Days are shown with hours, hours alone below a day, minutes alone below an hour.
 */
export function formatTimeRemaining(reference: Date, deadline: Date): string {
  const remaining = deadline.getTime() - reference.getTime();

  if (remaining < 0) {
    return 'Expired';
  }

  const days = Math.floor(remaining / DAY_MS);
  const hours = Math.floor((remaining % DAY_MS) / HOUR_MS);
  const minutes = Math.floor((remaining % HOUR_MS) / MINUTE_MS);

  if (days > 0) {
    return `${days} day(s), ${hours} hour(s)`;
  }
  if (hours > 0) {
    return `${hours} hour(s)`;
  }
  if (minutes > 0) {
    return `${minutes} minute(s)`;
  }
  if (remaining >= 1000) {
    return 'Less than a minute';
  }
  return 'Closing very soon';
}

