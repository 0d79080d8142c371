/**
 * The fixed record shape every upload is mapped onto. Keys are the stored
 * field names; labels are what a user sees in the mapping screen and are also
 * accepted as exact header matches.
 */

export const MAX_FIELD_LENGTH = 255;
export const MAX_PHONE_COLUMNS = 7;
export const MAX_SAMPLE_VALUES = 3;

export const SKIP = 'skip';

export const CANONICAL_FIELDS = [
  'fullname',
  'first_name',
  'last_name',
  'property_street',
  'property_city',
  'property_state',
  'property_zipcode',
  'mailing_street',
  'mailing_city',
  'mailing_state',
  'mailing_zipcode',
  'phone',
  'email',
  'custom_1',
  'custom_2',
  'custom_3',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];
export type MappingTarget = CanonicalField | typeof SKIP;

export const MAPPING_TARGETS = [...CANONICAL_FIELDS, SKIP] as const;

export const FIELD_LABELS: Record<CanonicalField, string> = {
  fullname: 'Full Name',
  first_name: 'First Name',
  last_name: 'Last Name',
  property_street: 'Property Street',
  property_city: 'Property City',
  property_state: 'Property State',
  property_zipcode: 'Property Zipcode',
  mailing_street: 'Mailing Street',
  mailing_city: 'Mailing City',
  mailing_state: 'Mailing State',
  mailing_zipcode: 'Mailing Zipcode',
  phone: 'Phone',
  email: 'Email',
  custom_1: 'Custom 1',
  custom_2: 'Custom 2',
  custom_3: 'Custom 3',
};

/** How many source columns may feed a field. */
export function columnLimit(field: CanonicalField): number {
  return field === 'phone' ? MAX_PHONE_COLUMNS : 1;
}

export function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.some((field) => field === value);
}
