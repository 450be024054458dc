/**
 * Number formatting for trajectory files.
 *
 * Matches the `%.18e` layout external graders expect: 18 fractional digits
 * and a signed exponent of at least two digits ("5.000000000000000000e-02").
 */

/** Format a number in fixed-width scientific notation. */
export function formatScientific(value: number, fractionDigits = 18): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';

  const [mantissa, exponent] = value.toExponential(fractionDigits).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  // toExponential drops the sign of negative zero
  const prefix = Object.is(value, -0) ? '-' : '';
  return `${prefix}${mantissa}e${sign}${digits}`;
}
