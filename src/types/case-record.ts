export type EntityCategory =
  | 'SoleProprietor'
  | 'Partnership'
  | 'Corporation'
  | 'LLC'
  | 'Trust'
  | 'Other';

export interface PostalAddress {
  line1: string;
  line2?: string;
  city: string;
  state: string;
  postalCode: string;
}

export interface ResponsibleParty {
  firstName: string;
  middleName?: string;
  lastName: string;
  title?: string;
  taxpayerId?: string;
  phone?: string;
}

export interface ExternalIds {
  accountId?: string;
  entityId?: string;
  caseId?: string;
}

export interface CaseRecord {
  recordId: string;
  entityName: string;
  entityType: string;
  trustType?: string;
  description?: string;
  numberOfMembers?: number;
  membersAreSpouses?: boolean;
  entityState: string;
  formationDate?: string;
  closingMonth?: string;
  tradeName?: string;
  careOfName?: string;
  county?: string;
  principalActivity?: string;
  expectsEmployees?: boolean;
  responsibleParty: ResponsibleParty;
  businessAddress: PostalAddress;
  mailingAddress?: PostalAddress;
  externalIds: ExternalIds;
}
