import { z } from 'zod';

export const SubTypeTableSchema = z.object({
  default: z.string(),
  byEntityType: z.record(z.string()).optional(),
  byTrustType: z.record(z.string()).optional(),
  nonProfit: z.string().optional(),
});

const CategorySchema = z.enum(['SoleProprietor', 'Partnership', 'Corporation', 'LLC', 'Trust', 'Other']);

export const EntityTablesSchema = z.object({
  categories: z.record(CategorySchema),
  subTypes: z.record(CategorySchema, SubTypeTableSchema),
  nonProfitKeywords: z.array(z.string().min(1)),
  twoMemberLlcStates: z.array(z.string().length(2)),
  closingMonthCategories: z.array(CategorySchema),
  formationFilingCategories: z.array(CategorySchema),
});

export const StateTableSchema = z.record(z.string().length(2));
