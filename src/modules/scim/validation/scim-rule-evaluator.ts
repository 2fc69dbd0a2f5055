import {
  childPath,
  complexElements,
  extensionPath,
  isEmptyValue,
  isPresent,
  isRecord,
  toRecord,
} from '../common/scim-attribute-utils';
import {
  fail,
  OK,
  ScimFieldError,
  ScimSchemaError,
  type ScimError,
  type ScimResult,
} from '../common/scim-errors';
import type { ScimExtensible } from '../common/scim-types';
import {
  SCIM_COMMON_ATTRIBUTES,
  type ScimAttributeDefinition,
} from '../schemas/scim-schema-definitions';
import {
  findExtensionBinding,
  type ScimExtensionBinding,
  type ScimResourceProfile,
  type ScimSchemaRegistry,
} from '../schemas/scim-schema-registry';

/**
 * `resource` checks a resource as held or returned by a service provider;
 * `create` additionally rejects attributes a client may not supply on creation.
 */
export type ScimValidationMode = 'resource' | 'create';

export interface ScimValidationOptions {
  mode?: ScimValidationMode;
  /** Registry supplying the profile; defaults to the core registry. */
  registry?: ScimSchemaRegistry;
}

/** A consistency check spanning several attributes; returns the first violation found. */
export type CrossFieldRule<T> = (resource: T) => ScimError | undefined;

/** Structural view every validated resource offers. */
export type ScimValidatable = ScimExtensible & { schemas?: string[] | null };

interface AttachedExtension {
  urn: string;
  binding: ScimExtensionBinding;
  payload: Record<string, unknown>;
}

/**
 * Generic rule evaluation over a resource profile. The per-type rule tables
 * are the schema definitions themselves; only cross-field rules are code.
 *
 * Order (first violation wins): schemas, extension consistency, required
 * attributes, primary uniqueness, canonical values, cross-field rules,
 * read-only attributes in create mode.
 */
export function evaluateResource<T extends ScimValidatable>(
  resource: T,
  profile: ScimResourceProfile,
  crossFieldRules: readonly CrossFieldRule<T>[],
  mode: ScimValidationMode = 'resource',
): ScimResult<void> {
  const schemasError = checkSchemas(resource.schemas, profile);
  if (schemasError) return fail(schemasError);

  const extensionResult = resolveExtensions(resource, profile);
  if (!extensionResult.ok) return extensionResult;
  const attached = extensionResult.value;

  const base = toRecord(resource);
  const baseAttributes = [...SCIM_COMMON_ATTRIBUTES, ...profile.definition.attributes];
  const targets = [
    { attributes: baseAttributes, record: base, path: '' },
    ...attached.map((ext) => ({ attributes: ext.binding.definition.attributes, record: ext.payload, path: extensionPath(ext.urn) })),
  ];

  const checks: Array<(attributes: readonly ScimAttributeDefinition[], record: Record<string, unknown>, path: string) => ScimError | undefined> = [
    checkRequired,
    checkPrimary,
    checkCanonicalValues,
  ];
  for (const check of checks) {
    for (const target of targets) {
      const error = check(target.attributes, target.record, target.path);
      if (error) return fail(error);
    }
  }

  for (const rule of crossFieldRules) {
    const error = rule(resource);
    if (error) return fail(error);
  }

  if (mode === 'create') {
    for (const target of targets) {
      const error = checkReadOnly(target.attributes, target.record, target.path);
      if (error) return fail(error);
    }
  }

  return OK;
}

/**
 * Required, primary and canonical-value checks on a bare attribute set, for
 * payloads validated outside a resource (an extension on its own).
 */
export function evaluateAttributes(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  mode: ScimValidationMode = 'resource',
): ScimResult<void> {
  const error =
    checkRequired(attributes, record, '') ??
    checkPrimary(attributes, record, '') ??
    checkCanonicalValues(attributes, record, '') ??
    (mode === 'create' ? checkReadOnly(attributes, record, '') : undefined);
  return error ? fail(error) : OK;
}

// ─── Step 1: schemas ────────────────────────────────────────────────

function checkSchemas(schemas: string[] | null | undefined, profile: ScimResourceProfile): ScimError | undefined {
  if (!schemas || schemas.length === 0) {
    return new ScimSchemaError('missingSchemas', 'schemas', "Attribute 'schemas' must be a non-empty list of schema URNs.");
  }

  const baseLower = profile.definition.id.toLowerCase();
  if (!schemas.some((urn) => urn.toLowerCase() === baseLower)) {
    return new ScimSchemaError(
      'missingBaseSchema',
      'schemas',
      `Attribute 'schemas' must include the base schema '${profile.definition.id}'.`,
    );
  }

  for (const [index, urn] of schemas.entries()) {
    if (urn.toLowerCase() === baseLower) continue;
    if (!findExtensionBinding(profile, urn)) {
      return new ScimSchemaError(
        'unknownSchema',
        childPath('schemas', index),
        `Schema '${urn}' is not a known extension of resource type '${profile.name}'.`,
      );
    }
  }
  return undefined;
}

// ─── Step 2: extension consistency ──────────────────────────────────

function resolveExtensions(resource: ScimValidatable, profile: ScimResourceProfile): ScimResult<AttachedExtension[]> {
  const schemas = resource.schemas ?? [];
  const baseLower = profile.definition.id.toLowerCase();
  const payloads = Object.entries(resource.extensions ?? {}).filter(([, payload]) => payload !== undefined);
  const findPayload = (urn: string) => payloads.find(([key]) => key.toLowerCase() === urn.toLowerCase());

  const attached: AttachedExtension[] = [];
  for (const urn of schemas) {
    if (urn.toLowerCase() === baseLower) continue;
    const binding = findExtensionBinding(profile, urn);
    const payload = findPayload(urn)?.[1];
    if (!binding || !isRecord(payload)) {
      return {
        ok: false,
        error: new ScimSchemaError('missingExtension', urn, `Schema '${urn}' is listed in 'schemas' but no extension data is attached.`),
      };
    }
    attached.push({ urn: binding.definition.id, binding, payload });
  }

  for (const [urn] of payloads) {
    if (!schemas.some((listed) => listed.toLowerCase() === urn.toLowerCase())) {
      return {
        ok: false,
        error: new ScimSchemaError('undeclaredExtension', urn, `Extension '${urn}' is attached but not listed in 'schemas'.`),
      };
    }
  }

  for (const binding of profile.extensions) {
    if (binding.required && !findPayload(binding.definition.id)) {
      return {
        ok: false,
        error: new ScimSchemaError(
          'missingExtension',
          binding.definition.id,
          `Extension '${binding.definition.id}' is required for resource type '${profile.name}'.`,
        ),
      };
    }
  }

  return { ok: true, value: attached };
}

// ─── Steps 3–5: attribute rules ─────────────────────────────────────

function checkRequired(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  path: string,
): ScimError | undefined {
  for (const attr of attributes) {
    const value = record[attr.name];
    const attrPath = childPath(path, attr.name);
    if (attr.required && isEmptyValue(value)) {
      return new ScimFieldError('requiredAttribute', attrPath, `Required attribute '${attrPath}' is missing or empty.`);
    }
    if (attr.type === 'complex' && attr.subAttributes) {
      for (const { element, path: elementPath } of complexElements(attr, value, attrPath)) {
        const nested = checkRequired(attr.subAttributes, element, elementPath);
        if (nested) return nested;
      }
    }
  }
  return undefined;
}

function checkPrimary(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  path: string,
): ScimError | undefined {
  for (const attr of attributes) {
    const value = record[attr.name];
    if (!attr.multiValued || attr.type !== 'complex' || !Array.isArray(value)) continue;

    const primaries = value.filter((element: unknown) => isRecord(element) && element.primary === true).length;
    if (primaries > 1) {
      const attrPath = childPath(path, attr.name);
      return new ScimFieldError(
        'multiplePrimary',
        attrPath,
        `Attribute '${attrPath}' has ${primaries} values marked primary; at most one is allowed.`,
      );
    }
  }
  return undefined;
}

function checkCanonicalValues(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  path: string,
): ScimError | undefined {
  for (const attr of attributes) {
    const value = record[attr.name];
    const attrPath = childPath(path, attr.name);

    if (attr.type === 'complex' && attr.subAttributes) {
      for (const { element, path: elementPath } of complexElements(attr, value, attrPath)) {
        const nested = checkCanonicalValues(attr.subAttributes, element, elementPath);
        if (nested) return nested;
      }
      continue;
    }

    const canonical = attr.canonicalValues;
    if (!canonical || canonical.length === 0 || !isPresent(value)) continue;

    const candidates: Array<[unknown, string]> = attr.multiValued && Array.isArray(value)
      ? value.map((element: unknown, index): [unknown, string] => [element, childPath(attrPath, index)])
      : [[value, attrPath]];
    for (const [candidate, candidatePath] of candidates) {
      if (typeof candidate !== 'string') continue;
      if (!matchesCanonical(candidate, canonical, attr.caseExact ?? false)) {
        return new ScimFieldError(
          'canonicalValue',
          candidatePath,
          `Attribute '${candidatePath}' has value '${candidate}'; expected one of: ${canonical.join(', ')}.`,
        );
      }
    }
  }
  return undefined;
}

function matchesCanonical(value: string, canonical: readonly string[], caseExact: boolean): boolean {
  if (caseExact) return canonical.includes(value);
  const lower = value.toLowerCase();
  return canonical.some((allowed) => allowed.toLowerCase() === lower);
}

// ─── Step 7: create-mode mutability ─────────────────────────────────

function checkReadOnly(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  path: string,
): ScimError | undefined {
  for (const attr of attributes) {
    const value = record[attr.name];
    if (!isPresent(value)) continue;
    const attrPath = childPath(path, attr.name);
    if (attr.mutability === 'readOnly') {
      return new ScimFieldError(
        'readOnlyAttribute',
        attrPath,
        `Attribute '${attrPath}' is read-only and must not be supplied on create.`,
      );
    }
    if (attr.type === 'complex' && attr.subAttributes) {
      for (const { element, path: elementPath } of complexElements(attr, value, attrPath)) {
        const nested = checkReadOnly(attr.subAttributes, element, elementPath);
        if (nested) return nested;
      }
    }
  }
  return undefined;
}
