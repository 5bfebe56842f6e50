import { ValidationError } from '../api/errors';
import { Ask, askSecret } from './prompt';

export const TOKEN_ENV = 'WEBEX_TEAMS_ACCESS_TOKEN';

const MAX_PROMPTS = 3;
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Access token from the environment, or read from the terminal when unset.
 */
export async function promptToken(env: NodeJS.ProcessEnv = process.env, ask: Ask = askSecret): Promise<string> {
  const preset = env[TOKEN_ENV]?.trim();
  if (preset) return preset;

  for (let attempt = 0; attempt < MAX_PROMPTS; attempt++) {
    const token = (await ask('Enter your Webex API access token: ')).trim();
    if (token) return token;
  }
  throw new ValidationError('Access token cannot be empty');
}

/** Webex tokens end in `_<org uuid>`. */
export function orgIdFromToken(token: string): string {
  if (!token.includes('_')) {
    throw new ValidationError('Invalid Webex API access token: no organization segment');
  }
  const orgId = token.slice(token.lastIndexOf('_') + 1);
  if (!UUID_RE.test(orgId)) {
    throw new ValidationError(`Invalid organization ID in access token: "${orgId}"`);
  }
  return orgId;
}
