import { z } from 'zod';

export const ElementLocatorSchema = z.object({
  strategy: z.enum(['id', 'css', 'xpath', 'name', 'text', 'ariaLabel']),
  value: z.string().min(1),
});

export const FieldConditionSchema = z
  .object({
    key: z.string(),
    equals: z.string().optional(),
    in: z.array(z.string()).optional(),
    present: z.boolean().optional(),
  })
  .refine((c) => c.equals !== undefined || c.in !== undefined || c.present !== undefined, {
    message: 'condition needs one of equals, in, present',
  });

export const FieldBindingSchema = z
  .object({
    key: z.string(),
    label: z.string(),
    kind: z.enum(['text', 'radio', 'dropdown', 'click']),
    locator: ElementLocatorSchema.optional(),
    options: z.record(ElementLocatorSchema).optional(),
    required: z.boolean().optional(),
    when: FieldConditionSchema.optional(),
  })
  .refine((f) => f.locator !== undefined || f.options !== undefined, {
    message: 'field needs a locator or options',
  });

export const ScreenDefinitionSchema = z.object({
  state: z.enum([
    'Start',
    'EntityClassification',
    'SubTypeSelection',
    'ResponsiblePartyDetails',
    'AddressDetails',
    'BusinessDetails',
    'ActivityDetails',
    'Review',
  ]),
  fields: z.array(FieldBindingSchema),
  continue: ElementLocatorSchema,
  checkpoint: z.boolean().optional(),
});

export const SiteProfileSchema = z.object({
  name: z.string(),
  startUrl: z.string().url(),
  screens: z.array(ScreenDefinitionSchema).min(1),
  boilerplate: z.object({
    terminalRejection: z.array(z.string().min(1)),
    validationError: z.array(z.string().min(1)),
  }),
  reference: z.object({
    markers: z.array(z.string().min(1)).min(1),
    pattern: z.string(),
    panelSelector: z.string(),
    itemSelector: z.string(),
  }),
  diagnostics: z.object({
    panelSelectors: z.array(z.string()),
    itemSelector: z.string(),
    ignoredHeaders: z.array(z.string()),
    patterns: z.array(z.string()),
    sentinelMessage: z.string(),
  }),
  completion: z.object({
    labels: z.array(z.string()).min(1),
    pattern: z.string(),
    separator: z.string().min(1),
    documentLocator: ElementLocatorSchema,
  }),
});
