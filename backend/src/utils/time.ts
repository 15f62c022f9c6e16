const EXPLICIT_ZONE_PATTERN = /([zZ]|[+\-]\d{2}:\d{2})$/;

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const parsed = Date.parse(EXPLICIT_ZONE_PATTERN.test(trimmed) ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const withExplicitTimezone = (value: string | null | undefined, timezoneHint: string = 'UTC'): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (EXPLICIT_ZONE_PATTERN.test(trimmed)) {
    return trimmed;
  }
  const isIsoWithoutZone = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/.test(trimmed);
  if (!isIsoWithoutZone) {
    return trimmed;
  }
  const normalizedTz = timezoneHint.trim().toUpperCase();
  if (normalizedTz === 'UTC' || normalizedTz === 'GMT') {
    return `${trimmed}Z`;
  }
  return trimmed;
};

// Open-Meteo hourly stamps carry no offset; the caller passes the zone they were requested in.
export const normalizeUtcIsoTimestamp = (value: string | null | undefined, timezoneHint: string = 'UTC'): string | null => {
  const zoned = withExplicitTimezone(value, timezoneHint);
  const parsedMs = parseIsoTimeToMs(zoned);
  if (parsedMs === null) {
    return null;
  }
  return new Date(parsedMs).toISOString();
};
