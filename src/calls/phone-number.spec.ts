import { matchCountryCode } from './international-rates.service';
import { digitsOnly, formatPhoneNumber, looksInternational, validatePhoneNumber } from './phone-number';

describe('phone numbers', () => {
  it('keeps digits only', () => {
    expect(digitsOnly('+1 (555) 123-4567 ext')).toBe('15551234567');
  });

  it('formats national and NANP numbers', () => {
    expect(formatPhoneNumber('5551234567')).toBe('(555) 123-4567');
    expect(formatPhoneNumber('15551234567')).toBe('+1 (555) 123-4567');
    expect(formatPhoneNumber('442079460000')).toBe('442079460000');
  });

  it('accepts 7 to 15 digits', () => {
    expect(validatePhoneNumber('(555) 123-4567')).toEqual({
      valid: true,
      clean: '5551234567',
      formatted: '(555) 123-4567',
    });
    expect(validatePhoneNumber('555-1234')).toEqual({ valid: true, clean: '5551234', formatted: '5551234' });
    expect(validatePhoneNumber('12345')).toEqual({ valid: false, error: 'Invalid phone number length' });
    expect(validatePhoneNumber('1234567890123456')).toEqual({ valid: false, error: 'Invalid phone number length' });
  });

  it('wants at least 10 digits behind a plus', () => {
    expect(validatePhoneNumber('+12345678')).toEqual({ valid: false, error: 'Invalid international number' });
    expect(validatePhoneNumber(' +44 20 7946 0000')).toMatchObject({ valid: true, clean: '442079460000' });
  });

  it('flags numbers that leave the national plan', () => {
    expect(looksInternational('+44 20 7946 0000', '442079460000')).toBe(true);
    expect(looksInternational('15551234567', '15551234567')).toBe(true);
    expect(looksInternational('555 123 4567', '5551234567')).toBe(false);
  });
});

describe('matchCountryCode', () => {
  const rates = [{ countryCode: '+1' }, { countryCode: '+1242' }, { countryCode: '+44' }, { countryCode: '+91' }];

  it('picks the longest matching prefix', () => {
    expect(matchCountryCode('+12425551234', rates)).toBe('+1242');
    expect(matchCountryCode('+14155550100', rates)).toBe('+1');
    expect(matchCountryCode('+919876543210', rates)).toBe('+91');
  });

  it('needs a plus and a known prefix', () => {
    expect(matchCountryCode('919876543210', rates)).toBeNull();
    expect(matchCountryCode('+999123', rates)).toBeNull();
  });
});
