import type { z } from 'zod';

import { SCIM_ENTERPRISE_USER_SCHEMA } from './scim-constants';
import type {
  scimAddressSchema,
  scimAuthenticationSchemeSchema,
  scimEnterpriseUserSchema,
  scimGroupMembershipSchema,
  scimGroupSchema,
  scimManagerSchema,
  scimMemberSchema,
  scimMetaSchema,
  scimMultiValueSchema,
  scimNameSchema,
  scimResourceTypeSchema,
  scimSchemaExtensionSchema,
  scimSearchRequestSchema,
  scimServiceProviderConfigSchema,
  scimUserSchema,
} from './scim-wire-schemas';

/**
 * Every attribute of the model is three-state:
 *   - property missing   → attribute absent, never written on encode
 *   - `null`             → attribute explicitly null, written as `null`
 *   - a value            → written as-is
 */
export type ScimMeta = z.infer<typeof scimMetaSchema>;
export type ScimName = z.infer<typeof scimNameSchema>;
export type ScimMultiValue = z.infer<typeof scimMultiValueSchema>;
export type ScimEmail = ScimMultiValue;
export type ScimPhoneNumber = ScimMultiValue;
export type ScimIm = ScimMultiValue;
export type ScimPhoto = ScimMultiValue;
export type ScimEntitlement = ScimMultiValue;
export type ScimRole = ScimMultiValue;
export type ScimX509Certificate = ScimMultiValue;
export type ScimAddress = z.infer<typeof scimAddressSchema>;
export type ScimGroupMembership = z.infer<typeof scimGroupMembershipSchema>;
export type ScimMember = z.infer<typeof scimMemberSchema>;
export type ScimManager = z.infer<typeof scimManagerSchema>;
export type ScimEnterpriseUser = z.infer<typeof scimEnterpriseUserSchema>;
export type ScimSchemaExtension = z.infer<typeof scimSchemaExtensionSchema>;
export type ScimAuthenticationScheme = z.infer<typeof scimAuthenticationSchemeSchema>;

/**
 * Extension payloads attached to a resource, keyed by extension URN.
 * Composition instead of inheritance: a User never *is* an EnterpriseUser,
 * it carries one under {@link SCIM_ENTERPRISE_USER_SCHEMA}.
 */
export interface ScimExtensionMap {
  [SCIM_ENTERPRISE_USER_SCHEMA]?: ScimEnterpriseUser;
  [urn: string]: object | undefined;
}

export interface ScimExtensible {
  extensions?: ScimExtensionMap;
  /** Unknown top-level attributes kept by the `preserve` decode policy, re-emitted on encode. */
  additionalAttributes?: Record<string, unknown>;
}

export type ScimUser = z.infer<typeof scimUserSchema> & ScimExtensible;
export type ScimGroup = z.infer<typeof scimGroupSchema> & ScimExtensible;
export type ScimResourceType = z.infer<typeof scimResourceTypeSchema> & ScimExtensible;
export type ScimServiceProviderConfig = z.infer<typeof scimServiceProviderConfigSchema> & ScimExtensible;

export type ScimResource = ScimUser | ScimGroup | ScimResourceType | ScimServiceProviderConfig;

export interface ScimListResponse<T> {
  schemas: string[];
  totalResults: number;
  startIndex?: number;
  itemsPerPage?: number;
  Resources: T[];
}

/** POST `/.search` body (RFC 7644 §3.4.3). */
export type ScimSearchRequest = z.infer<typeof scimSearchRequestSchema>;

export type ScimSortOrder = 'ascending' | 'descending';

/** Query parameters of a list request (`GET /Users?filter=...&startIndex=...`), with paging defaults applied. */
export interface ScimListQuery {
  filter?: string;
  attributes?: string[];
  excludedAttributes?: string[];
  sortBy?: string;
  sortOrder?: ScimSortOrder;
  startIndex: number;
  count: number;
}
