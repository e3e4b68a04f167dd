import moment from 'moment-timezone';

function now(timezone?: string): moment.Moment {
  return timezone ? moment().tz(timezone) : moment();
}

/** `YYYY-MM-DD`, used as the prefix of AI generated note titles. */
export function dateStamp(timezone?: string): string {
  return now(timezone).format('YYYY-MM-DD');
}

/** `YYYY-MM-DD HH:mm`, used for submit times and default titles. */
export function minuteStamp(timezone?: string): string {
  return now(timezone).format('YYYY-MM-DD HH:mm');
}
