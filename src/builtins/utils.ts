/**
 * Formats a number the way `.` and `.s` print it: integral values without a
 * fractional part, everything else in shortest round-trip form.
 */
export const formatNumber = (value: number): string => {
  if (Object.is(value, -0)) return '0'
  return String(value)
}
