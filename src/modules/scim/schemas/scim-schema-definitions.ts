/**
 * SCIM Schema Representations: RFC 7643 §7
 *
 * A schema definition is the declarative rule table the validator and the
 * codec consume: for each attribute its type, cardinality, requiredness,
 * canonical values, mutability and sub-attributes. The core definitions ship
 * as JSON documents beside this file (the same documents a service provider
 * returns from `/Schemas`) and are checked on load.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7643#section-7
 */
import { z } from 'zod';

import userSchemaJson from './core-user.schema.json';
import groupSchemaJson from './core-group.schema.json';
import enterpriseUserSchemaJson from './enterprise-user.schema.json';
import resourceTypeSchemaJson from './core-resource-type.schema.json';
import serviceProviderConfigSchemaJson from './core-service-provider-config.schema.json';

const attributeCore = {
  name: z.string().min(1),
  type: z.enum(['string', 'boolean', 'decimal', 'integer', 'dateTime', 'reference', 'binary', 'complex']),
  multiValued: z.boolean(),
  description: z.string().optional(),
  required: z.boolean(),
  canonicalValues: z.array(z.string()).optional(),
  caseExact: z.boolean().optional(),
  mutability: z.enum(['readOnly', 'readWrite', 'immutable', 'writeOnly']),
  returned: z.enum(['always', 'never', 'default', 'request']),
  uniqueness: z.enum(['none', 'server', 'global']).optional(),
  referenceTypes: z.array(z.string()).optional(),
};

const subAttributeDefinitionSchema = z.object(attributeCore).strict();

const attributeDefinitionSchema = z
  .object({
    ...attributeCore,
    subAttributes: z.array(subAttributeDefinitionSchema).optional(),
  })
  .strict();

export const schemaDefinitionSchema = z
  .object({
    id: z.string().startsWith('urn:'),
    name: z.string(),
    description: z.string().optional(),
    attributes: z.array(attributeDefinitionSchema),
  })
  .strict();

export type ScimAttributeType = z.infer<typeof attributeDefinitionSchema>['type'];
export type ScimAttributeDefinition = z.infer<typeof attributeDefinitionSchema>;
export type ScimSchemaDefinition = z.infer<typeof schemaDefinitionSchema>;

/**
 * Validate a raw schema representation. Throws on a malformed definition:
 * definitions are configuration, so a bad one is a programming error rather
 * than a runtime input failure. The returned definition is deeply frozen.
 */
export function parseSchemaDefinition(raw: unknown): ScimSchemaDefinition {
  const parsed = schemaDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid SCIM schema definition at '${issue.path.join('.')}': ${issue.message}`);
  }

  const complexWithoutSubAttributes = parsed.data.attributes.find(
    (attr) => attr.type === 'complex' && (!attr.subAttributes || attr.subAttributes.length === 0),
  );
  if (complexWithoutSubAttributes) {
    throw new Error(
      `Invalid SCIM schema definition '${parsed.data.id}': complex attribute '${complexWithoutSubAttributes.name}' has no subAttributes.`,
    );
  }
  return deepFreeze(parsed.data);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Common attributes (RFC 7643 §3.1) carried by every resource but not listed
 * in the per-resource schema documents.
 */
export const SCIM_COMMON_ATTRIBUTES: readonly ScimAttributeDefinition[] = deepFreeze<ScimAttributeDefinition[]>([
  {
    name: 'schemas',
    type: 'reference',
    multiValued: true,
    required: true,
    caseExact: false,
    mutability: 'readWrite',
    returned: 'always',
    referenceTypes: ['uri'],
  },
  {
    name: 'id',
    type: 'string',
    multiValued: false,
    required: false,
    caseExact: true,
    mutability: 'readOnly',
    returned: 'always',
    uniqueness: 'server',
  },
  {
    name: 'externalId',
    type: 'string',
    multiValued: false,
    required: false,
    caseExact: true,
    mutability: 'readWrite',
    returned: 'default',
  },
  {
    name: 'meta',
    type: 'complex',
    multiValued: false,
    required: false,
    mutability: 'readOnly',
    returned: 'default',
    subAttributes: [
      { name: 'resourceType', type: 'string', multiValued: false, required: false, caseExact: true, mutability: 'readOnly', returned: 'default' },
      { name: 'created', type: 'dateTime', multiValued: false, required: false, mutability: 'readOnly', returned: 'default' },
      { name: 'lastModified', type: 'dateTime', multiValued: false, required: false, mutability: 'readOnly', returned: 'default' },
      { name: 'location', type: 'reference', multiValued: false, required: false, caseExact: true, mutability: 'readOnly', returned: 'default', referenceTypes: ['uri'] },
      { name: 'version', type: 'string', multiValued: false, required: false, caseExact: true, mutability: 'readOnly', returned: 'default' },
    ],
  },
]);

export const CORE_USER_SCHEMA = parseSchemaDefinition(userSchemaJson);
export const CORE_GROUP_SCHEMA = parseSchemaDefinition(groupSchemaJson);
export const ENTERPRISE_USER_SCHEMA = parseSchemaDefinition(enterpriseUserSchemaJson);
export const CORE_RESOURCE_TYPE_SCHEMA = parseSchemaDefinition(resourceTypeSchemaJson);
export const CORE_SERVICE_PROVIDER_CONFIG_SCHEMA = parseSchemaDefinition(serviceProviderConfigSchemaJson);
