// src/calls/phone-number.ts

export type PhoneValidation =
  | { valid: true; clean: string; formatted: string }
  | { valid: false; error: string };

export function digitsOnly(raw: string): string {
  return raw.replace(/\D+/g, '');
}

/** (AAA) BBB-CCCC for 10 digits, +1 (AAA) BBB-CCCC for NANP with a leading 1, else as is. */
export function formatPhoneNumber(digits: string): string {
  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (digits.length === 11 && digits.startsWith('1')) {
    return `+1 (${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return digits;
}

export function validatePhoneNumber(raw: string): PhoneValidation {
  const clean = digitsOnly(raw);

  if (clean.length < 7 || clean.length > 15) {
    return { valid: false, error: 'Invalid phone number length' };
  }
  if (raw.trim().startsWith('+') && clean.length < 10) {
    return { valid: false, error: 'Invalid international number' };
  }
  return { valid: true, clean, formatted: formatPhoneNumber(clean) };
}

/** Dialled numbers with a + prefix or more than 10 digits leave the national plan. */
export function looksInternational(raw: string, clean: string): boolean {
  return raw.trim().startsWith('+') || clean.length > 10;
}
