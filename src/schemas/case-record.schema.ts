import { z } from 'zod';

const optionalText = z.string().trim().optional();

export const PostalAddressSchema = z.object({
  line1: z.string().trim().min(1),
  line2: optionalText,
  city: z.string().trim().min(1),
  state: z.string().trim().min(1),
  postalCode: z.string().trim().min(1),
});

export const ResponsiblePartySchema = z.object({
  firstName: z.string().trim().min(1),
  middleName: optionalText,
  lastName: z.string().trim().min(1),
  title: optionalText,
  taxpayerId: optionalText,
  phone: optionalText,
});

export const ExternalIdsSchema = z.object({
  accountId: optionalText,
  entityId: optionalText,
  caseId: optionalText,
});

export const CaseRecordSchema = z.object({
  recordId: z.string().trim().min(1),
  entityName: z.string().trim().min(1),
  entityType: z.string().trim().min(1),
  trustType: optionalText,
  description: optionalText,
  numberOfMembers: z.coerce.number().int().nonnegative().optional(),
  membersAreSpouses: z.boolean().optional(),
  entityState: z.string().trim().min(1),
  formationDate: optionalText,
  closingMonth: optionalText,
  tradeName: optionalText,
  careOfName: optionalText,
  county: optionalText,
  principalActivity: optionalText,
  expectsEmployees: z.boolean().optional(),
  responsibleParty: ResponsiblePartySchema,
  businessAddress: PostalAddressSchema,
  mailingAddress: PostalAddressSchema.optional(),
  externalIds: ExternalIdsSchema.default({}),
});
