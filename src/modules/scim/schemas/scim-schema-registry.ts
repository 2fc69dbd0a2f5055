import type { z } from 'zod';

import {
  SCIM_CORE_GROUP_SCHEMA,
  SCIM_CORE_USER_SCHEMA,
  SCIM_ENTERPRISE_USER_SCHEMA,
  SCIM_LIST_RESPONSE_SCHEMA,
  SCIM_RESOURCE_TYPE,
  SCIM_RESOURCE_TYPE_SCHEMA,
  SCIM_SCHEMA_SCHEMA,
  SCIM_SP_CONFIG_SCHEMA,
  type ScimResourceTypeName,
} from '../common/scim-constants';
import type { ScimListResponse, ScimResourceType, ScimServiceProviderConfig } from '../common/scim-types';
import { scimEnterpriseUserSchema, scimGenericExtensionSchema } from '../common/scim-wire-schemas';
import {
  CORE_GROUP_SCHEMA,
  CORE_RESOURCE_TYPE_SCHEMA,
  CORE_SERVICE_PROVIDER_CONFIG_SCHEMA,
  CORE_USER_SCHEMA,
  ENTERPRISE_USER_SCHEMA,
  parseSchemaDefinition,
  type ScimSchemaDefinition,
} from './scim-schema-definitions';

/** An extension schema bound to a resource type. */
export interface ScimExtensionBinding {
  definition: ScimSchemaDefinition;
  /** When true, every resource of the type must carry this extension. */
  required: boolean;
  /** Wire shape of the payload; generic JSON object for extensions without a dedicated model. */
  wireSchema: z.ZodType<Record<string, unknown>>;
}

/**
 * Everything the engine knows about one resource type: where it lives, its
 * base schema, and the extensions it may carry.
 */
export interface ScimResourceProfile {
  name: ScimResourceTypeName;
  endpoint: string;
  description: string;
  definition: ScimSchemaDefinition;
  extensions: readonly ScimExtensionBinding[];
}

/** Extension schema supplied by an integration on top of the core set. */
export interface ScimExtensionRegistration {
  resourceType: typeof SCIM_RESOURCE_TYPE.USER | typeof SCIM_RESOURCE_TYPE.GROUP;
  /** Raw RFC 7643 §7 schema representation; validated on registration. */
  schema: unknown;
  required?: boolean;
}

export interface ScimSchemaRegistryOptions {
  /** Whether Users must carry the Enterprise User extension (default false). */
  enterpriseUserRequired?: boolean;
  extensions?: readonly ScimExtensionRegistration[];
}

/**
 * Immutable catalogue of resource profiles. Built once; every lookup is a
 * pure read, so one instance can be shared by any number of callers.
 */
export class ScimSchemaRegistry {
  private readonly profiles: ReadonlyMap<ScimResourceTypeName, ScimResourceProfile>;

  constructor(options: ScimSchemaRegistryOptions = {}) {
    const userExtensions: ScimExtensionBinding[] = [
      {
        definition: ENTERPRISE_USER_SCHEMA,
        required: options.enterpriseUserRequired ?? false,
        wireSchema: scimEnterpriseUserSchema,
      },
    ];
    const groupExtensions: ScimExtensionBinding[] = [];

    const known = new Set([
      SCIM_CORE_USER_SCHEMA,
      SCIM_CORE_GROUP_SCHEMA,
      SCIM_RESOURCE_TYPE_SCHEMA,
      SCIM_SP_CONFIG_SCHEMA,
      SCIM_ENTERPRISE_USER_SCHEMA,
    ].map((urn) => urn.toLowerCase()));

    for (const registration of options.extensions ?? []) {
      const definition = parseSchemaDefinition(registration.schema);
      const urnLower = definition.id.toLowerCase();
      if (known.has(urnLower)) {
        throw new Error(`Schema '${definition.id}' is already registered.`);
      }
      known.add(urnLower);

      const binding: ScimExtensionBinding = {
        definition,
        required: registration.required ?? false,
        wireSchema: scimGenericExtensionSchema,
      };
      if (registration.resourceType === SCIM_RESOURCE_TYPE.USER) {
        userExtensions.push(binding);
      } else if (registration.resourceType === SCIM_RESOURCE_TYPE.GROUP) {
        groupExtensions.push(binding);
      } else {
        throw new Error(
          `Extension '${definition.id}' cannot be bound to resource type '${String(registration.resourceType)}'; expected 'User' or 'Group'.`,
        );
      }
    }

    const profiles: ScimResourceProfile[] = [
      {
        name: SCIM_RESOURCE_TYPE.USER,
        endpoint: '/Users',
        description: 'User Account',
        definition: CORE_USER_SCHEMA,
        extensions: Object.freeze(userExtensions),
      },
      {
        name: SCIM_RESOURCE_TYPE.GROUP,
        endpoint: '/Groups',
        description: 'Group',
        definition: CORE_GROUP_SCHEMA,
        extensions: Object.freeze(groupExtensions),
      },
      {
        name: SCIM_RESOURCE_TYPE.RESOURCE_TYPE,
        endpoint: '/ResourceTypes',
        description: 'Resource Type',
        definition: CORE_RESOURCE_TYPE_SCHEMA,
        extensions: [],
      },
      {
        name: SCIM_RESOURCE_TYPE.SERVICE_PROVIDER_CONFIG,
        endpoint: '/ServiceProviderConfig',
        description: 'Service Provider Configuration',
        definition: CORE_SERVICE_PROVIDER_CONFIG_SCHEMA,
        extensions: [],
      },
    ];

    this.profiles = new Map(profiles.map((profile) => [profile.name, profile]));
  }

  getProfile(resourceType: ScimResourceTypeName): ScimResourceProfile {
    const profile = this.profiles.get(resourceType);
    if (!profile) {
      throw new Error(`Unknown SCIM resource type '${resourceType}'.`);
    }
    return profile;
  }

  /** Find an extension binding of a resource type by URN (case-insensitive). */
  findExtension(resourceType: ScimResourceTypeName, urn: string): ScimExtensionBinding | undefined {
    return findExtensionBinding(this.getProfile(resourceType), urn);
  }

  /**
   * Every schema definition known to the registry, base schemas first. The
   * result is a copy; the definitions the validator reads stay untouched.
   */
  getSchemas(): ScimSchemaDefinition[] {
    const profiles = [...this.profiles.values()];
    return structuredClone([
      ...profiles.map((profile) => profile.definition),
      ...profiles.flatMap((profile) => profile.extensions.map((ext) => ext.definition)),
    ]);
  }

  /** `/Schemas` discovery body (RFC 7644 §4). */
  getSchemasListResponse(): ScimListResponse<ScimSchemaDefinition & { schemas: string[] }> {
    const resources = this.getSchemas().map((definition) => ({ schemas: [SCIM_SCHEMA_SCHEMA], ...definition }));
    return {
      schemas: [SCIM_LIST_RESPONSE_SCHEMA],
      totalResults: resources.length,
      startIndex: 1,
      itemsPerPage: resources.length,
      Resources: resources,
    };
  }

  /** ResourceType descriptors of the provisionable resources (User and Group). */
  getResourceTypes(): ScimResourceType[] {
    return [SCIM_RESOURCE_TYPE.USER, SCIM_RESOURCE_TYPE.GROUP].map((name) => {
      const profile = this.getProfile(name);
      const resourceType: ScimResourceType = {
        schemas: [SCIM_RESOURCE_TYPE_SCHEMA],
        id: profile.name,
        name: profile.name,
        endpoint: profile.endpoint,
        description: profile.description,
        schema: profile.definition.id,
        schemaExtensions: profile.extensions.map((ext) => ({ schema: ext.definition.id, required: ext.required })),
        meta: { resourceType: SCIM_RESOURCE_TYPE.RESOURCE_TYPE },
      };
      return resourceType;
    });
  }
}

export function findExtensionBinding(profile: ScimResourceProfile, urn: string): ScimExtensionBinding | undefined {
  const lower = urn.toLowerCase();
  return profile.extensions.find((ext) => ext.definition.id.toLowerCase() === lower);
}

/** Registry over the core schemas plus the optional Enterprise User extension. */
export const DEFAULT_SCIM_SCHEMA_REGISTRY = new ScimSchemaRegistry();

/**
 * A ServiceProviderConfig document advertising the given capabilities. Unset
 * features default to unsupported.
 */
export function buildServiceProviderConfig(
  overrides: Partial<Omit<ScimServiceProviderConfig, 'schemas'>> = {},
): ScimServiceProviderConfig {
  return {
    schemas: [SCIM_SP_CONFIG_SCHEMA],
    patch: { supported: false },
    bulk: { supported: false, maxOperations: 0, maxPayloadSize: 0 },
    filter: { supported: false, maxResults: 0 },
    changePassword: { supported: false },
    sort: { supported: false },
    etag: { supported: false },
    authenticationSchemes: [
      {
        type: 'oauthbearertoken',
        name: 'OAuth Bearer Token',
        description: 'Authentication scheme using the OAuth Bearer Token Standard',
        specUri: 'https://www.rfc-editor.org/info/rfc6750',
      },
    ],
    ...overrides,
    meta: { resourceType: SCIM_RESOURCE_TYPE.SERVICE_PROVIDER_CONFIG, ...(overrides.meta ?? {}) },
  };
}
