import { describe, it, expect } from 'vitest';

import { addressFingerprint, litigatorFingerprint, nameKey } from '@src/utils/fingerprint';
import type { AddressParts } from '@src/types/pipeline';

const address = (street: string, overrides: Partial<AddressParts> = {}): AddressParts => ({
  street,
  city: 'Springfield',
  state: 'IL',
  zipcode: '62701',
  ...overrides,
});

describe('addressFingerprint', () => {
  it('joins normalized street, city, state and 5 digit zip', () => {
    expect(addressFingerprint(address('12 Main Street', { zipcode: '62701-1234' })))
      .toBe('12 main st|springfield|il|62701');
  });

  it('ignores case, punctuation and extra whitespace', () => {
    const a = addressFingerprint(address('12  MAIN st.', { city: ' springfield ', state: 'il' }));
    const b = addressFingerprint(address('12 Main Street'));
    expect(a).toBe(b);
  });

  it('keeps different house numbers apart', () => {
    expect(addressFingerprint(address('12 Main St'))).not.toBe(addressFingerprint(address('14 Main St')));
  });
});

describe('nameKey', () => {
  it('uses last name letters and first initial', () => {
    expect(nameKey('Jane', 'Doe')).toBe('doe:j');
  });

  it('strips punctuation and generational suffixes', () => {
    expect(nameKey('John', "O'Neil Jr.")).toBe('oneil:j');
    expect(nameKey('john', 'oneil III')).toBe('oneil:j');
  });

  it('returns null without both names', () => {
    expect(nameKey('', 'Doe')).toBeNull();
    expect(nameKey('Jane', '')).toBeNull();
  });
});

describe('litigatorFingerprint', () => {
  it('combines the name key and the address fingerprint', () => {
    expect(litigatorFingerprint('Jane', 'Doe', address('12 Main St')))
      .toBe('doe:j|12 main st|springfield|il|62701');
  });

  it('returns null when the address has no street', () => {
    expect(litigatorFingerprint('Jane', 'Doe', address(''))).toBeNull();
  });
});
