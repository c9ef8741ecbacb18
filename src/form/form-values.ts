import type { CaseRecord, PostalAddress } from '../types/index.js';
import { classifyEntity } from './entity-classifier.js';
import {
  cleanName,
  cleanText,
  normalizePhone,
  normalizePostalCode,
  normalizeState,
  parseFormationDate,
} from './normalize.js';
import { getEntityTables, type EntityTables } from './tables.js';

/** Flat key → value map consumed by the screen filler. Absent keys are not filled. */
export type FormValues = Record<string, string>;

function put(values: FormValues, key: string, value: string | null | undefined): void {
  if (value) values[key] = value;
}

function putAddress(values: FormValues, prefix: string, address: PostalAddress): void {
  put(values, `${prefix}.line1`, cleanText(address.line1));
  put(values, `${prefix}.line2`, cleanText(address.line2));
  put(values, `${prefix}.city`, cleanName(address.city));
  put(values, `${prefix}.state`, normalizeState(address.state));
  put(values, `${prefix}.postalCode`, normalizePostalCode(address.postalCode));
}

/**
 * Derive every form value from the case record: classification, branch
 * selectors and normalized text. The record itself is not modified.
 */
export function buildFormValues(record: CaseRecord, tables: EntityTables = getEntityTables()): FormValues {
  const values: FormValues = {};
  const entity = classifyEntity(record.entityType, record.description, record.trustType, tables);
  const entityState = normalizeState(record.entityState);

  put(values, 'category', entity.category);
  put(values, 'subType', entity.subType);
  put(values, 'entityState', entityState);

  if (entity.category === 'LLC' && record.numberOfMembers !== undefined) {
    put(values, 'llc.memberCount', String(record.numberOfMembers));
    if (
      record.numberOfMembers === 2 &&
      entityState !== null &&
      tables.twoMemberLlcStates.includes(entityState)
    ) {
      put(values, 'llc.spouseChoice', record.membersAreSpouses ? 'spouses' : 'partners');
    }
  }

  if (tables.formationFilingCategories.includes(entity.category)) {
    put(values, 'formationState', entityState);
  }

  if (tables.closingMonthCategories.includes(entity.category)) {
    put(values, 'closingMonth', record.closingMonth?.trim() || '12');
  }

  const started = parseFormationDate(record.formationDate);
  if (started) {
    put(values, 'startMonth', String(started.month));
    put(values, 'startYear', String(started.year));
  }

  const party = record.responsibleParty;
  put(values, 'party.firstName', cleanName(party.firstName));
  put(values, 'party.middleName', cleanName(party.middleName));
  put(values, 'party.lastName', cleanName(party.lastName));
  put(values, 'party.title', cleanText(party.title));
  put(values, 'party.taxpayerId', party.taxpayerId?.replace(/\D/g, ''));
  put(values, 'party.phone', normalizePhone(party.phone));

  putAddress(values, 'address', record.businessAddress);
  put(values, 'address.county', cleanName(record.county));
  if (record.mailingAddress) {
    put(values, 'mailing.different', 'yes');
    putAddress(values, 'mailing', record.mailingAddress);
  } else {
    put(values, 'mailing.different', 'no');
  }

  put(values, 'business.name', cleanText(record.entityName));
  put(values, 'business.tradeName', cleanText(record.tradeName));
  put(values, 'business.careOfName', cleanName(record.careOfName));

  put(values, 'activity.principal', cleanText(record.principalActivity));
  put(values, 'activity.employees', record.expectsEmployees ? 'yes' : 'no');

  return values;
}
