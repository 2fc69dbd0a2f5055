export const SCIM_CORE_USER_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const SCIM_CORE_GROUP_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const SCIM_RESOURCE_TYPE_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:ResourceType';
export const SCIM_SP_CONFIG_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:ServiceProviderConfig';
export const SCIM_SCHEMA_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Schema';
export const SCIM_ENTERPRISE_USER_SCHEMA = 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User';
export const SCIM_LIST_RESPONSE_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:ListResponse';
export const SCIM_ERROR_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:Error';
export const SCIM_SEARCH_REQUEST_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:SearchRequest';

/** Paging defaults of a query that leaves them out (RFC 7644 §3.4.2.4). */
export const SCIM_DEFAULT_START_INDEX = 1;
export const SCIM_DEFAULT_COUNT = 100;

/** Prefix shared by every schema URN; keys starting with it are treated as extension namespaces. */
export const SCIM_URN_PREFIX = 'urn:';

/**
 * Resource type names as they appear in `meta.resourceType` and ResourceType `name`.
 */
export const SCIM_RESOURCE_TYPE = {
  USER: 'User',
  GROUP: 'Group',
  RESOURCE_TYPE: 'ResourceType',
  SERVICE_PROVIDER_CONFIG: 'ServiceProviderConfig',
} as const;

export type ScimResourceTypeName = typeof SCIM_RESOURCE_TYPE[keyof typeof SCIM_RESOURCE_TYPE];

/**
 * RFC 7644 §3.12: Standard SCIM error scimType values.
 * These are the "detail error keyword" values defined in Table 9.
 * @see https://datatracker.ietf.org/doc/html/rfc7644#section-3.12
 */
export const SCIM_ERROR_TYPE = {
  /** The request body is invalid or not conforming (400) */
  INVALID_SYNTAX: 'invalidSyntax',
  /** One or more values are not valid (400) */
  INVALID_VALUE: 'invalidValue',
  /** The attempted modification is not compatible with the attribute's mutability (400) */
  MUTABILITY: 'mutability',
} as const;

export type ScimErrorType = typeof SCIM_ERROR_TYPE[keyof typeof SCIM_ERROR_TYPE];

/**
 * Group member kinds (RFC 7643 §4.2). Also the canonical values of `members.type`.
 */
export const SCIM_MEMBER_TYPES = ['User', 'Group'] as const;

/** Endpoint path segment each member kind's `$ref` points into. */
export const SCIM_MEMBER_ENDPOINTS: Record<typeof SCIM_MEMBER_TYPES[number], string> = {
  User: '/Users/',
  Group: '/Groups/',
};
