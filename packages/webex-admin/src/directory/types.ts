export const PATCH_OP_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:PatchOp';

export interface ScimEmail {
  value: string;
  type?: string;
  primary?: boolean;
}

export interface ScimRole {
  value: string;
  type?: string;
  display?: string;
}

// Raw user resource as returned by the identity API. Every field is optional
// on the wire.
export interface ScimUserResource {
  id?: string;
  userName?: string;
  emails?: ScimEmail[];
  displayName?: string;
  nickName?: string;
  name?: {
    givenName?: string;
    familyName?: string;
  };
  roles?: Array<ScimRole | string>;
  timezone?: string;
  active?: boolean;
  userType?: string;
  [key: string]: unknown;
}

export interface ScimListResponse {
  schemas?: string[];
  totalResults?: number;
  itemsPerPage?: number;
  startIndex?: number;
  Resources?: unknown[];
}

export type PatchOpName = 'add' | 'replace' | 'remove';

export interface PatchOperation {
  op: PatchOpName;
  path?: string;
  value?: unknown;
}

export interface PatchDocument {
  schemas: string[];
  Operations: PatchOperation[];
}
