import { readFile } from 'node:fs/promises';
import type { SiteProfile } from '../types/index.js';
import { SiteProfileSchema } from '../schemas/index.js';
import { InfrastructureError } from '../exception/errors.js';

export interface ProfileOverrides {
  startUrl?: string;
}

/** Read and validate a site profile. Any read or schema problem is an infrastructure fault. */
export async function loadSiteProfile(path: string, overrides: ProfileOverrides = {}): Promise<SiteProfile> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InfrastructureError(`Cannot read site profile at ${path}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new InfrastructureError(`Site profile ${path} is not valid JSON`, error);
  }

  const parsed = SiteProfileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InfrastructureError(`Invalid site profile ${path}: ${issues.join('; ')}`);
  }

  const profile: SiteProfile = parsed.data;
  return overrides.startUrl ? { ...profile, startUrl: overrides.startUrl } : profile;
}

/** Screens in the order the workflow visits them. */
export function orderedScreens(profile: SiteProfile): SiteProfile['screens'] {
  const order = [
    'Start',
    'EntityClassification',
    'SubTypeSelection',
    'ResponsiblePartyDetails',
    'AddressDetails',
    'BusinessDetails',
    'ActivityDetails',
    'Review',
  ];
  return [...profile.screens].sort((a, b) => order.indexOf(a.state) - order.indexOf(b.state));
}
