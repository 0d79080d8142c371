/**
 * Reduce a phone cell to its 10 digits, or '' when that is impossible.
 *
 * Spreadsheet exports often turn numbers into floats ("5551234567.0"), so a
 * single decimal point and what follows it are dropped first. A leading US
 * country code is removed.
 */
export function cleanPhone(raw: string): string {
  let value = raw.trim();
  if (value.split('.').length === 2) {
    value = value.split('.')[0];
  }

  let digits = value.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }

  return digits.length === 10 ? digits : '';
}

export function looksLikePhone(raw: string): boolean {
  return /\d/.test(raw) && cleanPhone(raw) !== '';
}
