import { SCIM_ENTERPRISE_USER_SCHEMA } from './scim-constants';
import type { ScimEnterpriseUser, ScimExtensible, ScimExtensionMap, ScimUser } from './scim-types';

type WithSchemas = ScimExtensible & { schemas?: string[] | null };

const sameUrn = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/** Extension URNs carried by a resource, in attachment order. */
export function listExtensionUrns(resource: ScimExtensible): string[] {
  return Object.entries(resource.extensions ?? {})
    .filter(([, payload]) => payload !== undefined)
    .map(([urn]) => urn);
}

/** Attached payload for a URN (case-insensitive), or undefined. */
export function getExtension(resource: ScimExtensible, urn: string): object | undefined {
  const entry = Object.entries(resource.extensions ?? {}).find(([key]) => sameUrn(key, urn));
  return entry?.[1];
}

export function getEnterpriseUser(user: ScimUser): ScimEnterpriseUser | undefined {
  return user.extensions?.[SCIM_ENTERPRISE_USER_SCHEMA];
}

/**
 * Copy of the resource with the payload attached under `urn` and the URN
 * listed in `schemas`. An existing payload under the same URN is replaced.
 */
export function withExtension<T extends WithSchemas>(resource: T, urn: string, payload: object): T {
  const extensions: ScimExtensionMap = {};
  for (const [key, value] of Object.entries(resource.extensions ?? {})) {
    if (!sameUrn(key, urn)) extensions[key] = value;
  }
  extensions[urn] = payload;

  const schemas = resource.schemas ?? [];
  return {
    ...resource,
    schemas: schemas.some((listed) => sameUrn(listed, urn)) ? [...schemas] : [...schemas, urn],
    extensions,
  };
}

export function withEnterpriseUser(user: ScimUser, enterprise: ScimEnterpriseUser): ScimUser {
  return withExtension(user, SCIM_ENTERPRISE_USER_SCHEMA, enterprise);
}

/** Copy of the resource with the payload and its `schemas` entry removed. */
export function withoutExtension<T extends WithSchemas>(resource: T, urn: string): T {
  const extensions: ScimExtensionMap = {};
  for (const [key, value] of Object.entries(resource.extensions ?? {})) {
    if (!sameUrn(key, urn)) extensions[key] = value;
  }

  return {
    ...resource,
    ...(resource.schemas ? { schemas: resource.schemas.filter((listed) => !sameUrn(listed, urn)) } : {}),
    extensions: Object.keys(extensions).length > 0 ? extensions : undefined,
  };
}
