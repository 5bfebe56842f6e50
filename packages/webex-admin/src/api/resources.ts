import { ConfigurationError } from './errors';

export const DEFAULT_BASE_URL = 'https://webexapis.com/v1';
export const DEFAULT_IDENTITY_URL = 'https://webexapis.com/identity';

// Paths are relative to the session's base URL. `{name}` placeholders are
// filled from the params passed to resourcePath().
export const RESOURCES = {
  people: 'people',
  pmr: 'meetingPreferences/personalMeetingRoom',
  reports: 'reports',
  recordingAccessSummary: 'recordingReport/accessSummary',
  recordingAccessDetail: 'recordingReport/accessDetail',
  scimUsers: 'scim/{orgId}/v2/Users',
} as const;

export type ResourceName = keyof typeof RESOURCES;

export function isResourceName(name: string): name is ResourceName {
  return Object.prototype.hasOwnProperty.call(RESOURCES, name);
}

export function resourcePath(
  name: ResourceName,
  params: Record<string, string> = {},
  ...segments: string[]
): string {
  const path = RESOURCES[name].replace(/\{(\w+)\}/g, (_, key: string) => {
    const value = params[key];
    if (!value) throw new ConfigurationError(`Resource "${name}" needs a value for {${key}}`);
    return encodeURIComponent(value);
  });
  return [path, ...segments.map(encodeURIComponent)].join('/');
}

/** Same as resourcePath() for a name that is not known at compile time; null when unknown. */
export function findResourcePath(
  name: string,
  params: Record<string, string> = {},
  ...segments: string[]
): string | null {
  return isResourceName(name) ? resourcePath(name, params, ...segments) : null;
}
