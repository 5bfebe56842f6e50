import { ValidationError } from '../api/errors';
import { isObject, JsonObject } from '../api/json';
import type { ScimEmail, ScimRole } from './types';

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toEmail(value: unknown): ScimEmail | null {
  if (typeof value === 'string') return { value };
  if (!isObject(value) || typeof value.value !== 'string') return null;
  return {
    value: value.value,
    ...(typeof value.type === 'string' ? { type: value.type } : {}),
    ...(typeof value.primary === 'boolean' ? { primary: value.primary } : {}),
  };
}

function toRole(value: unknown): ScimRole | null {
  if (typeof value === 'string') return { value };
  if (!isObject(value) || typeof value.value !== 'string') return null;
  return {
    value: value.value,
    ...(typeof value.type === 'string' ? { type: value.type } : {}),
    ...(typeof value.display === 'string' ? { display: value.display } : {}),
  };
}

function list<T>(value: unknown, map: (item: unknown) => T | null): readonly T[] {
  if (!Array.isArray(value)) return Object.freeze([]);
  return Object.freeze(value.map(map).filter((item): item is T => item !== null));
}

/**
 * One account in the directory. Missing or mistyped attributes decode to
 * empty values (and `active` to false); only a non-object input is rejected.
 */
export class DirectoryRecord {
  readonly id: string;
  readonly userName: string;
  readonly emails: readonly ScimEmail[];
  readonly displayName: string;
  readonly nickName: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly roles: readonly ScimRole[];
  readonly timezone: string;
  readonly active: boolean;
  readonly type: string;

  private constructor(resource: JsonObject) {
    const name: JsonObject = isObject(resource.name) ? resource.name : {};

    this.id = str(resource.id);
    this.userName = str(resource.userName);
    this.emails = list(resource.emails, toEmail);
    this.displayName = str(resource.displayName);
    this.nickName = str(resource.nickName);
    this.firstName = str(name.givenName);
    this.lastName = str(name.familyName);
    this.roles = list(resource.roles, toRole);
    this.timezone = str(resource.timezone);
    this.active = resource.active === true;
    this.type = str(resource.userType);
    Object.freeze(this);
  }

  static fromResource(resource: unknown): DirectoryRecord {
    if (!isObject(resource)) {
      throw new ValidationError(`Expected a user resource object, got ${Array.isArray(resource) ? 'array' : typeof resource}`);
    }
    return new DirectoryRecord(resource);
  }

  get primaryEmail(): string {
    const primary = this.emails.find(email => email.primary) ?? this.emails[0];
    return primary?.value ?? this.userName;
  }

  hasEmail(email: string): boolean {
    const wanted = email.trim().toLowerCase();
    if (!wanted) return false;
    return this.userName.toLowerCase() === wanted || this.emails.some(e => e.value.toLowerCase() === wanted);
  }

  equals(other: DirectoryRecord): boolean {
    return this.id === other.id;
  }
}
