/**
 * Wire shapes of every SCIM resource (RFC 7643 §4–§6, §3.1 common attributes).
 *
 * These schemas only describe JSON value *shapes*: which attribute holds a
 * string, a boolean, an integer, a sub-record or an ordered array of them.
 * Requiredness, canonical values and mutability are schema-definition rules
 * evaluated by the validator, so every attribute here is `nullish()`: 
 * absent, explicitly `null`, or a value.
 *
 * Object keys follow the canonical output order of the encoder: `schemas`
 * first, `meta` last.
 */
import { z } from 'zod';

const str = () => z.string().nullish();
const bool = () => z.boolean().nullish();
const int = () => z.number().int().nullish();

// ─── Common ─────────────────────────────────────────────────────────

export const scimMetaSchema = z.object({
  resourceType: str(),
  created: str(),
  lastModified: str(),
  location: str(),
  version: str(),
});

const commonHead = {
  schemas: z.array(z.string()).nullish(),
  id: str(),
  externalId: str(),
};

// ─── User ───────────────────────────────────────────────────────────

export const scimNameSchema = z.object({
  formatted: str(),
  familyName: str(),
  givenName: str(),
  middleName: str(),
  honorificPrefix: str(),
  honorificSuffix: str(),
});

/** Standard sub-attributes of a multi-valued attribute (RFC 7643 §2.4). */
export const scimMultiValueSchema = z.object({
  value: str(),
  display: str(),
  type: str(),
  primary: bool(),
});

export const scimAddressSchema = z.object({
  formatted: str(),
  streetAddress: str(),
  locality: str(),
  region: str(),
  postalCode: str(),
  country: str(),
  type: str(),
  primary: bool(),
});

export const scimGroupMembershipSchema = z.object({
  value: str(),
  $ref: str(),
  display: str(),
  type: str(),
});

const multi = <T extends z.ZodTypeAny>(element: T) => z.array(element).nullish();

export const scimUserSchema = z.object({
  ...commonHead,
  userName: str(),
  name: scimNameSchema.nullish(),
  displayName: str(),
  nickName: str(),
  profileUrl: str(),
  title: str(),
  userType: str(),
  preferredLanguage: str(),
  locale: str(),
  timezone: str(),
  active: bool(),
  password: str(),
  emails: multi(scimMultiValueSchema),
  phoneNumbers: multi(scimMultiValueSchema),
  ims: multi(scimMultiValueSchema),
  photos: multi(scimMultiValueSchema),
  addresses: multi(scimAddressSchema),
  groups: multi(scimGroupMembershipSchema),
  entitlements: multi(scimMultiValueSchema),
  roles: multi(scimMultiValueSchema),
  x509Certificates: multi(scimMultiValueSchema),
  meta: scimMetaSchema.nullish(),
});

// ─── Enterprise User extension ──────────────────────────────────────

export const scimManagerSchema = z.object({
  value: str(),
  $ref: str(),
  displayName: str(),
});

export const scimEnterpriseUserSchema = z.object({
  employeeNumber: str(),
  costCenter: str(),
  organization: str(),
  division: str(),
  department: str(),
  manager: scimManagerSchema.nullish(),
});

/** Payload shape for extensions registered without a dedicated wire schema. */
export const scimGenericExtensionSchema = z.record(z.string(), z.unknown());

// ─── Group ──────────────────────────────────────────────────────────

export const scimMemberSchema = z.object({
  value: str(),
  $ref: str(),
  display: str(),
  type: str(),
});

export const scimGroupSchema = z.object({
  ...commonHead,
  displayName: str(),
  members: multi(scimMemberSchema),
  meta: scimMetaSchema.nullish(),
});

// ─── ResourceType ───────────────────────────────────────────────────

export const scimSchemaExtensionSchema = z.object({
  schema: str(),
  required: bool(),
});

export const scimResourceTypeSchema = z.object({
  ...commonHead,
  name: str(),
  description: str(),
  endpoint: str(),
  schema: str(),
  schemaExtensions: multi(scimSchemaExtensionSchema),
  meta: scimMetaSchema.nullish(),
});

// ─── ServiceProviderConfig ──────────────────────────────────────────

export const scimSupportedSchema = z.object({
  supported: bool(),
});

export const scimBulkSchema = z.object({
  supported: bool(),
  maxOperations: int(),
  maxPayloadSize: int(),
});

export const scimFilterSchema = z.object({
  supported: bool(),
  maxResults: int(),
});

export const scimAuthenticationSchemeSchema = z.object({
  type: str(),
  name: str(),
  description: str(),
  specUri: str(),
  documentationUri: str(),
  primary: bool(),
});

export const scimServiceProviderConfigSchema = z.object({
  ...commonHead,
  documentationUri: str(),
  patch: scimSupportedSchema.nullish(),
  bulk: scimBulkSchema.nullish(),
  filter: scimFilterSchema.nullish(),
  changePassword: scimSupportedSchema.nullish(),
  sort: scimSupportedSchema.nullish(),
  etag: scimSupportedSchema.nullish(),
  authenticationSchemes: multi(scimAuthenticationSchemeSchema),
  meta: scimMetaSchema.nullish(),
});

// ─── ListResponse ───────────────────────────────────────────────────

export const scimListResponseEnvelopeSchema = z.object({
  schemas: z.array(z.string()).nullish(),
  totalResults: int(),
  startIndex: int(),
  itemsPerPage: int(),
  Resources: z.array(z.unknown()).nullish(),
});

// ─── SearchRequest (RFC 7644 §3.4.3) ────────────────────────────────

export const scimSearchRequestSchema = z.object({
  schemas: z.array(z.string()).nullish(),
  attributes: z.array(z.string()).nullish(),
  excludedAttributes: z.array(z.string()).nullish(),
  filter: str(),
  sortBy: str(),
  sortOrder: z.enum(['ascending', 'descending']).nullish(),
  startIndex: int(),
  count: int(),
});
