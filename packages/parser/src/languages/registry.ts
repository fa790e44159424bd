import type { LanguageProfile } from './types.js';
import { goProfile } from './go.js';

/**
 * Canonical list of supported language IDs.
 * To add a language: add its ID here, then its profile to `profiles` below.
 */
export const LANGUAGE_IDS = ['go'] as const;
export type LanguageId = (typeof LANGUAGE_IDS)[number];

const profiles: LanguageProfile[] = [goProfile];

const profileRegistry = new Map<string, LanguageProfile>();

for (const profile of profiles) {
  if (profileRegistry.has(profile.id)) {
    throw new Error(`Duplicate language ID in registry: ${profile.id}`);
  }
  profileRegistry.set(profile.id, profile);
}

for (const id of LANGUAGE_IDS) {
  if (!profileRegistry.has(id)) {
    throw new Error(`Language "${id}" is in LANGUAGE_IDS but has no profile in the registry`);
  }
}

/**
 * Get the profile for a supported language.
 *
 * @throws Error if language is not registered
 */
export function getLanguageProfile(language: LanguageId): LanguageProfile {
  const profile = profileRegistry.get(language);
  if (!profile) {
    throw new Error(`No language profile registered for: ${language}`);
  }
  return profile;
}

