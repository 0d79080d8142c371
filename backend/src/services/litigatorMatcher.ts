import logger from 'jet-logger';

import {
  LITIGATOR_TYPES,
  type CanonicalRecord,
  type ContactMetadata,
  type LitigatorMatch,
  type LitigatorRecord,
} from '@src/types/pipeline';
import type { LitigatorStore } from '@src/types/stores';
import { litigatorFingerprint } from '@src/utils/fingerprint';
import { cleanPhone } from '@src/utils/phone';

/**
 * Litigator Matcher
 *
 * Looks a record up on the blocklist two ways: by name key + address
 * fingerprint (property and mailing address), and by phone number (the
 * uploaded phones plus the ones the skip-trace returned). The most severe
 * hit wins.
 */
export class LitigatorMatcher {
  constructor(private readonly store: LitigatorStore) {}

  /**
   * Fingerprints a record is looked up under, property address first.
   */
  fingerprintsFor(record: CanonicalRecord): string[] {
    const candidates = [record.property, record.mailing]
      .map((address) => litigatorFingerprint(record.firstName, record.lastName, address))
      .filter((fp): fp is string => fp !== null);
    return [...new Set(candidates)];
  }

  /**
   * Uploaded phones first, then returned ones, as 10 digit strings.
   */
  phonesFor(record: CanonicalRecord, contact?: ContactMetadata): string[] {
    const returned = (contact?.phones ?? []).map((phone) => cleanPhone(phone.number));
    return [...new Set([...record.phones, ...returned])].filter((phone) => phone !== '');
  }

  async match(record: CanonicalRecord, contact?: ContactMetadata): Promise<LitigatorMatch> {
    const fingerprints = this.fingerprintsFor(record);
    const phones = this.phonesFor(record, contact);
    if (fingerprints.length === 0 && phones.length === 0) {
      return { matched: false };
    }

    const none: LitigatorRecord[] = [];
    const [byAddress, byPhone] = await Promise.all([
      fingerprints.length > 0 ? this.store.findByFingerprints(fingerprints) : none,
      phones.length > 0 ? this.store.findByPhones(phones) : none,
    ]);
    const hits = [...byAddress, ...byPhone];
    if (hits.length === 0) {
      return { matched: false };
    }

    const hit = mostSevere(hits);
    logger.warn(`🚫 Row ${record.rowNumber} matches blocklisted ${hit.litigatorType} (${hit.id})`);

    // Address hits come first, so ties are reported as address matches
    if (byAddress.includes(hit)) {
      return {
        matched: true,
        litigatorId: hit.id,
        litigatorType: hit.litigatorType,
        matchedOn: 'name_address',
        fingerprint: hit.fingerprint,
      };
    }
    return {
      matched: true,
      litigatorId: hit.id,
      litigatorType: hit.litigatorType,
      matchedOn: 'phone',
      phone: phones.find((phone) => hit.phones.includes(phone)),
    };
  }
}

function mostSevere(hits: LitigatorRecord[]): LitigatorRecord {
  return hits.reduce((best, hit) => (
    LITIGATOR_TYPES.indexOf(hit.litigatorType) < LITIGATOR_TYPES.indexOf(best.litigatorType) ? hit : best
  ));
}
