import type { z } from 'zod';

import {
  childPath,
  describeJsonType,
  extensionPath,
  findAttribute,
  formatPath,
  isRecord,
  setOwnProperty,
  toRecord,
} from '../common/scim-attribute-utils';
import { SCIM_RESOURCE_TYPE, type ScimResourceTypeName } from '../common/scim-constants';
import {
  fail,
  ok,
  ScimSchemaError,
  ScimSyntaxError,
  ScimTypeMismatchError,
  type ScimResult,
} from '../common/scim-errors';
import type { ScimExtensible, ScimExtensionMap } from '../common/scim-types';
import {
  scimGroupSchema,
  scimResourceTypeSchema,
  scimServiceProviderConfigSchema,
  scimUserSchema,
} from '../common/scim-wire-schemas';
import { SCIM_COMMON_ATTRIBUTES, type ScimAttributeDefinition } from '../schemas/scim-schema-definitions';
import {
  DEFAULT_SCIM_SCHEMA_REGISTRY,
  findExtensionBinding,
  type ScimResourceProfile,
  type ScimSchemaRegistry,
} from '../schemas/scim-schema-registry';

/**
 * What decode does with a top-level key that is neither an attribute of the
 * resource nor a registered extension URN:
 *   - `reject`   → ScimSchemaError
 *   - `ignore`   → dropped
 *   - `preserve` → kept in `additionalAttributes` and written back on encode
 * Unknown sub-attributes are rejected under `reject` and dropped otherwise.
 */
export type ScimUnknownAttributePolicy = 'reject' | 'ignore' | 'preserve';

export const SCIM_UNKNOWN_ATTRIBUTE_POLICIES: readonly ScimUnknownAttributePolicy[] = ['reject', 'ignore', 'preserve'];

export interface ScimDecodeOptions {
  /** No default: callers choose strictness explicitly. */
  unknownAttributes: ScimUnknownAttributePolicy;
  registry?: ScimSchemaRegistry;
}

export interface ScimEncodeOptions {
  /** Indent the output with two spaces. */
  pretty?: boolean;
  registry?: ScimSchemaRegistry;
}

/** Binds a resource type's profile name to its wire shape. */
export interface ScimResourceCodec<S extends z.AnyZodObject> {
  resourceType: ScimResourceTypeName;
  wireSchema: S;
}

export type ScimDecoded<S extends z.AnyZodObject> = z.output<S> & ScimExtensible;

export const SCIM_USER_CODEC: ScimResourceCodec<typeof scimUserSchema> = {
  resourceType: SCIM_RESOURCE_TYPE.USER,
  wireSchema: scimUserSchema,
};

export const SCIM_GROUP_CODEC: ScimResourceCodec<typeof scimGroupSchema> = {
  resourceType: SCIM_RESOURCE_TYPE.GROUP,
  wireSchema: scimGroupSchema,
};

export const SCIM_RESOURCE_TYPE_CODEC: ScimResourceCodec<typeof scimResourceTypeSchema> = {
  resourceType: SCIM_RESOURCE_TYPE.RESOURCE_TYPE,
  wireSchema: scimResourceTypeSchema,
};

export const SCIM_SERVICE_PROVIDER_CONFIG_CODEC: ScimResourceCodec<typeof scimServiceProviderConfigSchema> = {
  resourceType: SCIM_RESOURCE_TYPE.SERVICE_PROVIDER_CONFIG,
  wireSchema: scimServiceProviderConfigSchema,
};

// ─── Decode ─────────────────────────────────────────────────────────

export function parseJsonText(text: string): ScimResult<unknown> {
  try {
    const document: unknown = JSON.parse(text);
    return ok(document);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(new ScimSyntaxError('invalidJson', undefined, `Malformed JSON: ${reason}`));
  }
}

export function decodeResource<S extends z.AnyZodObject>(
  text: string,
  codec: ScimResourceCodec<S>,
  options: ScimDecodeOptions,
): ScimResult<ScimDecoded<S>> {
  const parsed = parseJsonText(text);
  if (!parsed.ok) return parsed;
  return decodeDocument(parsed.value, codec, options);
}

/** Decode an already-parsed JSON value. */
export function decodeDocument<S extends z.AnyZodObject>(
  document: unknown,
  codec: ScimResourceCodec<S>,
  options: ScimDecodeOptions,
): ScimResult<ScimDecoded<S>> {
  if (!isRecord(document)) {
    return fail(
      new ScimSyntaxError(
        'notAnObject',
        undefined,
        `Expected a JSON object for ${codec.resourceType}, received ${describeJsonType(document)}.`,
      ),
    );
  }

  const profile = (options.registry ?? DEFAULT_SCIM_SCHEMA_REGISTRY).getProfile(codec.resourceType);
  const attributes = [...SCIM_COMMON_ATTRIBUTES, ...profile.definition.attributes];
  const policy = options.unknownAttributes;

  const base: Record<string, unknown> = {};
  const extensions: ScimExtensionMap = {};
  const additionalAttributes: Record<string, unknown> = {};
  const seen = new Map<string, string>();

  for (const [key, value] of Object.entries(document)) {
    const duplicate = checkDuplicate(seen, key, '');
    if (duplicate) return fail(duplicate);

    const attr = findAttribute(attributes, key);
    if (attr) {
      const normalized = normalizeValue(attr, value, attr.name, policy);
      if (!normalized.ok) return normalized;
      base[attr.name] = normalized.value;
      continue;
    }

    const binding = findExtensionBinding(profile, key);
    if (binding) {
      const urn = binding.definition.id;
      if (!isRecord(value)) {
        return fail(
          new ScimTypeMismatchError('invalidType', urn, `Extension '${urn}' expected object, received ${describeJsonType(value)}.`),
        );
      }
      const normalized = normalizeRecord(binding.definition.attributes, value, extensionPath(urn), policy);
      if (!normalized.ok) return normalized;
      const payload = binding.wireSchema.safeParse(normalized.value);
      if (!payload.success) return fail(toTypeMismatch(payload.error, extensionPath(urn)));
      extensions[urn] = payload.data;
      continue;
    }

    if (policy === 'reject') {
      return fail(
        new ScimSchemaError('unknownAttribute', key, `Attribute '${key}' is not defined for resource type '${profile.name}'.`),
      );
    }
    if (policy === 'preserve') {
      setOwnProperty(additionalAttributes, key, value);
    }
  }

  const parsed = codec.wireSchema.safeParse(base);
  if (!parsed.success) return fail(toTypeMismatch(parsed.error, ''));

  const extras: ScimExtensible = {};
  if (Object.keys(extensions).length > 0) extras.extensions = extensions;
  if (Object.keys(additionalAttributes).length > 0) extras.additionalAttributes = additionalAttributes;
  const resource: ScimDecoded<S> = Object.assign(parsed.data, extras);
  return ok(resource);
}

function checkDuplicate(seen: Map<string, string>, key: string, path: string): ScimSyntaxError | undefined {
  const lower = key.toLowerCase();
  const previous = seen.get(lower);
  if (previous !== undefined) {
    const attrPath = childPath(path, key);
    return new ScimSyntaxError(
      'duplicateAttribute',
      attrPath,
      `Attribute '${attrPath}' appears more than once ('${previous}' and '${key}'); attribute names are case-insensitive.`,
    );
  }
  seen.set(lower, key);
  return undefined;
}

/** Canonical spelling for the sub-attribute keys of a complex value; shape errors are left to zod. */
function normalizeValue(
  attr: ScimAttributeDefinition,
  value: unknown,
  path: string,
  policy: ScimUnknownAttributePolicy,
): ScimResult<unknown> {
  const subAttributes = attr.subAttributes;
  if (attr.type !== 'complex' || !subAttributes) return ok(value);

  if (attr.multiValued) {
    if (!Array.isArray(value)) return ok(value);
    const elements: unknown[] = [];
    for (const [index, element] of value.entries()) {
      if (!isRecord(element)) {
        elements.push(element);
        continue;
      }
      const normalized = normalizeRecord(subAttributes, element, childPath(path, index), policy);
      if (!normalized.ok) return normalized;
      elements.push(normalized.value);
    }
    return ok(elements);
  }

  return isRecord(value) ? normalizeRecord(subAttributes, value, path, policy) : ok(value);
}

function normalizeRecord(
  attributes: readonly ScimAttributeDefinition[],
  record: Record<string, unknown>,
  path: string,
  policy: ScimUnknownAttributePolicy,
): ScimResult<Record<string, unknown>> {
  const out: Record<string, unknown> = {};
  const seen = new Map<string, string>();
  for (const [key, value] of Object.entries(record)) {
    const duplicate = checkDuplicate(seen, key, path);
    if (duplicate) return fail(duplicate);

    const attr = findAttribute(attributes, key);
    if (!attr) {
      if (policy === 'reject') {
        const attrPath = childPath(path, key);
        return fail(new ScimSchemaError('unknownAttribute', attrPath, `Attribute '${attrPath}' is not defined by its schema.`));
      }
      continue;
    }
    const normalized = normalizeValue(attr, value, childPath(path, attr.name), policy);
    if (!normalized.ok) return normalized;
    out[attr.name] = normalized.value;
  }
  return ok(out);
}

function toTypeMismatch(error: z.ZodError, base: string): ScimTypeMismatchError {
  const [issue] = error.issues;
  const path = formatPath(issue.path, base);
  const message =
    issue.code === 'invalid_type'
      ? `Attribute '${path}' expected ${issue.expected}, received ${issue.received}.`
      : `Attribute '${path}': ${issue.message}`;
  return new ScimTypeMismatchError('invalidType', path, message);
}

// ─── Encode ─────────────────────────────────────────────────────────

/**
 * Wire object of a resource: `schemas` and the other attributes in schema
 * order, preserved unknown attributes, extensions under their URN keys, then
 * `meta`. Absent attributes are omitted; explicit `null` is kept.
 */
export function toWireObject<S extends z.AnyZodObject>(
  resource: ScimDecoded<S>,
  codec: ScimResourceCodec<S>,
  registry: ScimSchemaRegistry = DEFAULT_SCIM_SCHEMA_REGISTRY,
): ScimResult<Record<string, unknown>> {
  const { extensions, additionalAttributes, ...base } = resource;
  const parsed = codec.wireSchema.safeParse(base);
  if (!parsed.success) return fail(toTypeMismatch(parsed.error, ''));

  const data = toRecord(parsed.data);
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (key !== 'meta') out[key] = value;
  }

  const taken = new Set(Object.keys(out).map((key) => key.toLowerCase()));
  taken.add('meta');
  for (const [key, value] of Object.entries(additionalAttributes ?? {})) {
    if (taken.has(key.toLowerCase())) continue;
    taken.add(key.toLowerCase());
    setOwnProperty(out, key, value);
  }

  const extensionResult = encodeExtensions(extensions, registry.getProfile(codec.resourceType));
  if (!extensionResult.ok) return extensionResult;
  Object.assign(out, extensionResult.value);

  if ('meta' in data) out.meta = data.meta;
  return ok(out);
}

function encodeExtensions(
  extensions: ScimExtensionMap | undefined,
  profile: ScimResourceProfile,
): ScimResult<Record<string, unknown>> {
  const out: Record<string, unknown> = {};
  const seen = new Map<string, string>();
  for (const [urn, payload] of Object.entries(extensions ?? {})) {
    if (payload === undefined) continue;
    const duplicate = checkDuplicate(seen, urn, '');
    if (duplicate) return fail(duplicate);
    const binding = findExtensionBinding(profile, urn);
    if (!binding) {
      out[urn] = payload;
      continue;
    }
    const parsed = binding.wireSchema.safeParse(payload);
    if (!parsed.success) return fail(toTypeMismatch(parsed.error, extensionPath(binding.definition.id)));
    out[binding.definition.id] = parsed.data;
  }
  return ok(out);
}

export function stringifyWireObject(value: unknown, pretty = false): ScimResult<string> {
  try {
    return ok(JSON.stringify(value, null, pretty ? 2 : undefined));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(new ScimSyntaxError('invalidJson', undefined, `Resource cannot be serialized: ${reason}`));
  }
}

export function encodeResource<S extends z.AnyZodObject>(
  resource: ScimDecoded<S>,
  codec: ScimResourceCodec<S>,
  options: ScimEncodeOptions = {},
): ScimResult<string> {
  const wire = toWireObject(resource, codec, options.registry);
  if (!wire.ok) return wire;
  return stringifyWireObject(wire.value, options.pretty);
}
