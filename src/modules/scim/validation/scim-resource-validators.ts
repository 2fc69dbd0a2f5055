import {
  SCIM_MEMBER_ENDPOINTS,
  SCIM_MEMBER_TYPES,
  SCIM_RESOURCE_TYPE,
  type ScimResourceTypeName,
} from '../common/scim-constants';
import { toRecord } from '../common/scim-attribute-utils';
import { ScimFieldError, type ScimResult } from '../common/scim-errors';
import type {
  ScimEnterpriseUser,
  ScimGroup,
  ScimMeta,
  ScimResourceType,
  ScimServiceProviderConfig,
  ScimUser,
} from '../common/scim-types';
import { ENTERPRISE_USER_SCHEMA } from '../schemas/scim-schema-definitions';
import { DEFAULT_SCIM_SCHEMA_REGISTRY } from '../schemas/scim-schema-registry';
import {
  evaluateAttributes,
  evaluateResource,
  type CrossFieldRule,
  type ScimValidationMode,
  type ScimValidationOptions,
} from './scim-rule-evaluator';

// ─── Cross-field rules ──────────────────────────────────────────────

/** `meta.resourceType`, when present, names the type being validated. */
function metaResourceTypeMatches<T extends { meta?: ScimMeta | null }>(expected: ScimResourceTypeName): CrossFieldRule<T> {
  return (resource) => {
    const actual = resource.meta?.resourceType;
    if (actual === undefined || actual === null || actual === expected) return undefined;
    return new ScimFieldError(
      'crossField',
      'meta.resourceType',
      `Attribute 'meta.resourceType' is '${actual}' but the resource is a ${expected}.`,
    );
  };
}

/**
 * A member's `$ref` points into the endpoint of its `type`, and a group never
 * lists itself. `type` spelling is a canonical-value rule checked earlier.
 */
const groupMembersConsistent: CrossFieldRule<ScimGroup> = (group) => {
  for (const [index, member] of (group.members ?? []).entries()) {
    const ref = member.$ref;
    const type = member.type?.toLowerCase();
    const kind = SCIM_MEMBER_TYPES.find((candidate) => candidate.toLowerCase() === type);
    if (ref && kind && !ref.includes(SCIM_MEMBER_ENDPOINTS[kind])) {
      return new ScimFieldError(
        'crossField',
        `members[${index}].$ref`,
        `Member $ref '${ref}' does not point to a ${kind} resource.`,
      );
    }
    if (group.id && member.value === group.id) {
      return new ScimFieldError('crossField', `members[${index}].value`, `Group '${group.id}' cannot be a member of itself.`);
    }
  }
  return undefined;
};

const resourceTypeExtensionsDistinct: CrossFieldRule<ScimResourceType> = (resourceType) => {
  const seen = new Set<string>();
  const base = resourceType.schema?.toLowerCase();
  for (const [index, extension] of (resourceType.schemaExtensions ?? []).entries()) {
    const urn = extension.schema?.toLowerCase();
    if (!urn) continue;
    const path = `schemaExtensions[${index}].schema`;
    if (urn === base) {
      return new ScimFieldError('crossField', path, `Schema extension '${extension.schema}' repeats the base schema.`);
    }
    if (seen.has(urn)) {
      return new ScimFieldError('crossField', path, `Schema extension '${extension.schema}' is listed more than once.`);
    }
    seen.add(urn);
  }
  return undefined;
};

const serviceProviderLimitsPositive: CrossFieldRule<ScimServiceProviderConfig> = (config) => {
  const limits: Array<[boolean, string, number | null | undefined]> = [
    [config.bulk?.supported === true, 'bulk.maxOperations', config.bulk?.maxOperations],
    [config.bulk?.supported === true, 'bulk.maxPayloadSize', config.bulk?.maxPayloadSize],
    [config.filter?.supported === true, 'filter.maxResults', config.filter?.maxResults],
  ];
  for (const [supported, path, limit] of limits) {
    if (supported && (limit === undefined || limit === null || limit <= 0)) {
      return new ScimFieldError('crossField', path, `Attribute '${path}' must be positive when the feature is supported.`);
    }
  }
  return undefined;
};

// ─── Per-resource validators ────────────────────────────────────────

const USER_RULES: readonly CrossFieldRule<ScimUser>[] = [metaResourceTypeMatches(SCIM_RESOURCE_TYPE.USER)];

const GROUP_RULES: readonly CrossFieldRule<ScimGroup>[] = [
  metaResourceTypeMatches(SCIM_RESOURCE_TYPE.GROUP),
  groupMembersConsistent,
];

const RESOURCE_TYPE_RULES: readonly CrossFieldRule<ScimResourceType>[] = [
  metaResourceTypeMatches(SCIM_RESOURCE_TYPE.RESOURCE_TYPE),
  resourceTypeExtensionsDistinct,
];

const SERVICE_PROVIDER_CONFIG_RULES: readonly CrossFieldRule<ScimServiceProviderConfig>[] = [
  metaResourceTypeMatches(SCIM_RESOURCE_TYPE.SERVICE_PROVIDER_CONFIG),
  serviceProviderLimitsPositive,
];

export function validateUser(user: ScimUser, options: ScimValidationOptions = {}): ScimResult<void> {
  const registry = options.registry ?? DEFAULT_SCIM_SCHEMA_REGISTRY;
  return evaluateResource(user, registry.getProfile(SCIM_RESOURCE_TYPE.USER), USER_RULES, options.mode);
}

export function validateGroup(group: ScimGroup, options: ScimValidationOptions = {}): ScimResult<void> {
  const registry = options.registry ?? DEFAULT_SCIM_SCHEMA_REGISTRY;
  return evaluateResource(group, registry.getProfile(SCIM_RESOURCE_TYPE.GROUP), GROUP_RULES, options.mode);
}

/** ResourceType descriptors are server-owned; there is no create mode. */
export function validateResourceType(resourceType: ScimResourceType): ScimResult<void> {
  return evaluateResource(
    resourceType,
    DEFAULT_SCIM_SCHEMA_REGISTRY.getProfile(SCIM_RESOURCE_TYPE.RESOURCE_TYPE),
    RESOURCE_TYPE_RULES,
  );
}

export function validateServiceProviderConfig(config: ScimServiceProviderConfig): ScimResult<void> {
  return evaluateResource(
    config,
    DEFAULT_SCIM_SCHEMA_REGISTRY.getProfile(SCIM_RESOURCE_TYPE.SERVICE_PROVIDER_CONFIG),
    SERVICE_PROVIDER_CONFIG_RULES,
  );
}

/** Every top-level Enterprise User attribute made required; sub-attributes keep their own rules. */
const ENTERPRISE_USER_COMPLETE_ATTRIBUTES = ENTERPRISE_USER_SCHEMA.attributes.map((attr) => ({ ...attr, required: true }));

export interface ScimEnterpriseUserValidationOptions {
  mode?: ScimValidationMode;
  /**
   * When true (the default), a detached payload must carry every field:
   * employeeNumber, costCenter, organization, division, department and
   * manager. When false, only the extension schema's own rules apply, as for
   * a payload attached to a User.
   */
  requireAllFields?: boolean;
}

/**
 * Attribute rules of the Enterprise User extension on a detached payload.
 * Paths are relative to the payload (`manager.value`).
 */
export function validateEnterpriseUser(
  extension: ScimEnterpriseUser,
  options: ScimEnterpriseUserValidationOptions = {},
): ScimResult<void> {
  const attributes = options.requireAllFields === false ? ENTERPRISE_USER_SCHEMA.attributes : ENTERPRISE_USER_COMPLETE_ATTRIBUTES;
  return evaluateAttributes(attributes, toRecord(extension), options.mode);
}
