import type { Logger } from 'pino';
import { ConfigurationError, ValidationError } from '../api/errors';
import { isEmptyBody, isObject } from '../api/json';
import type { PageIterator } from '../api/pageIterator';
import { DEFAULT_IDENTITY_URL, resourcePath } from '../api/resources';
import { Session } from '../api/session';
import type { SessionConfig } from '../api/types';
import { DirectoryRecord } from './record';
import { PATCH_OP_SCHEMA, PatchDocument, PatchOperation } from './types';
import { UserIterator } from './userIterator';

export interface DirectoryClientConfig extends SessionConfig {
  orgId?: string;
}

export function buildPatchDocument(value: Record<string, unknown>, op: PatchOperation['op'] = 'replace'): PatchDocument {
  return {
    schemas: [PATCH_OP_SCHEMA],
    Operations: [{ op, value }],
  };
}

export function assertPatchDocument(value: unknown): asserts value is PatchDocument {
  if (!isObject(value)) {
    throw new ValidationError('Patch document must be an object');
  }
  if (!Array.isArray(value.schemas)) {
    throw new ValidationError('Patch document is missing "schemas"');
  }
  if (!Array.isArray(value.Operations)) {
    throw new ValidationError('Patch document is missing "Operations"');
  }
}

/**
 * SCIM user operations for one organization's directory.
 */
export class DirectoryClient {
  readonly orgId: string;
  private readonly logger: Logger;

  constructor(
    readonly session: Session,
    orgId = '',
  ) {
    this.orgId = orgId;
    this.logger = session.logger;
  }

  /** Every user in the organization, fetched page by page as the caller iterates. */
  listUsers(orgId?: string): UserIterator {
    return new UserIterator(this.session, this.usersPath(orgId), this.logger);
  }

  async getUser(userId: string, orgId?: string): Promise<DirectoryRecord | null> {
    const path = this.usersPath(orgId, userId);
    return this.first(this.session.get(path));
  }

  /**
   * Applies a SCIM PatchOp document. The returned record reflects the server's
   * view after the update; callers check it rather than trusting the status code.
   */
  async updateUserPatch(userId: string, patch: PatchDocument, orgId?: string): Promise<DirectoryRecord | null> {
    assertPatchDocument(patch);
    const path = this.usersPath(orgId, userId);
    return this.first(this.session.patch(path, { data: patch }));
  }

  async deactivateUser(userId: string, orgId?: string): Promise<DirectoryRecord | null> {
    return this.updateUserPatch(userId, buildPatchDocument({ active: false }), orgId);
  }

  async findUserByEmail(email: string, orgId?: string): Promise<DirectoryRecord | null> {
    for await (const user of this.listUsers(orgId)) {
      if (user.hasEmail(email)) return user;
    }
    return null;
  }

  // Single-resource calls: an empty body means "no such user".
  private async first(pages: PageIterator): Promise<DirectoryRecord | null> {
    try {
      const result = await pages.next();
      if (result.done || isEmptyBody(result.value.data)) return null;
      return DirectoryRecord.fromResource(result.value.data);
    } finally {
      await pages.return();
    }
  }

  private usersPath(orgId: string | undefined, ...segments: string[]): string {
    const org = orgId || this.orgId;
    if (!org) {
      throw new ConfigurationError('Organization ID is required');
    }
    return resourcePath('scimUsers', { orgId: org }, ...segments);
  }
}

export function createDirectoryClient(config: DirectoryClientConfig = {}): DirectoryClient {
  const { orgId, ...sessionConfig } = config;
  const session = new Session({ ...sessionConfig, baseUrl: sessionConfig.baseUrl ?? DEFAULT_IDENTITY_URL });
  return new DirectoryClient(session, orgId);
}
