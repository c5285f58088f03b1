import { DurationFormatError } from '../shared/errors.js';

const DURATION_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

/**
 * ISO-8601 duration as whole seconds: `PT7M32S` → 452, `P1DT2H` → 93600.
 * Only day, hour, minute and second tokens are accepted.
 */
export function parseDuration(iso: string): number {
  const match = DURATION_PATTERN.exec(iso.trim());
  if (!match) {
    throw new DurationFormatError(iso);
  }

  const [, days, hours, minutes, seconds] = match;
  return (
    toInt(days) * 86400 +
    toInt(hours) * 3600 +
    toInt(minutes) * 60 +
    toInt(seconds)
  );
}

function toInt(part: string | undefined): number {
  return part ? Number.parseInt(part, 10) : 0;
}
