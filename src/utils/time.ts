export function epochToDate(epochSeconds: number): Date {
  return new Date(Math.floor(epochSeconds) * 1000);
}

export function epochToIso(epochSeconds: number): string {
  return epochToDate(epochSeconds).toISOString();
}

/**
 * Calendar subtraction in UTC. Feb 29 minus a non-leap number of years rolls
 * over to Mar 1, matching `Date#setUTCFullYear`.
 */
export function subtractYears(date: Date, years: number): Date {
  const result = new Date(date);
  result.setUTCFullYear(result.getUTCFullYear() - years);
  return result;
}
