import type { z } from 'zod';

import { isRecord } from '../common/scim-attribute-utils';
import { SCIM_LIST_RESPONSE_SCHEMA } from '../common/scim-constants';
import {
  fail,
  ok,
  ScimFieldError,
  ScimSchemaError,
  ScimSyntaxError,
  ScimTypeMismatchError,
  withPathPrefix,
  type ScimResult,
} from '../common/scim-errors';
import type {
  ScimGroup,
  ScimListResponse,
  ScimResourceType,
  ScimServiceProviderConfig,
  ScimUser,
} from '../common/scim-types';
import { scimListResponseEnvelopeSchema } from '../common/scim-wire-schemas';
import {
  decodeDocument,
  decodeResource,
  encodeResource,
  parseJsonText,
  SCIM_GROUP_CODEC,
  SCIM_RESOURCE_TYPE_CODEC,
  SCIM_SERVICE_PROVIDER_CONFIG_CODEC,
  SCIM_USER_CODEC,
  stringifyWireObject,
  toWireObject,
  type ScimDecodeOptions,
  type ScimDecoded,
  type ScimEncodeOptions,
  type ScimResourceCodec,
} from './scim-resource-codec';

// ─── Resources ──────────────────────────────────────────────────────

export function userToJson(user: ScimUser, options?: ScimEncodeOptions): ScimResult<string> {
  return encodeResource(user, SCIM_USER_CODEC, options);
}

export function groupToJson(group: ScimGroup, options?: ScimEncodeOptions): ScimResult<string> {
  return encodeResource(group, SCIM_GROUP_CODEC, options);
}

export function resourceTypeToJson(resourceType: ScimResourceType, options?: ScimEncodeOptions): ScimResult<string> {
  return encodeResource(resourceType, SCIM_RESOURCE_TYPE_CODEC, options);
}

export function serviceProviderConfigToJson(
  config: ScimServiceProviderConfig,
  options?: ScimEncodeOptions,
): ScimResult<string> {
  return encodeResource(config, SCIM_SERVICE_PROVIDER_CONFIG_CODEC, options);
}

export function jsonToUser(text: string, options: ScimDecodeOptions): ScimResult<ScimUser> {
  return decodeResource(text, SCIM_USER_CODEC, options);
}

export function jsonToGroup(text: string, options: ScimDecodeOptions): ScimResult<ScimGroup> {
  return decodeResource(text, SCIM_GROUP_CODEC, options);
}

export function jsonToResourceType(text: string, options: ScimDecodeOptions): ScimResult<ScimResourceType> {
  return decodeResource(text, SCIM_RESOURCE_TYPE_CODEC, options);
}

export function jsonToServiceProviderConfig(
  text: string,
  options: ScimDecodeOptions,
): ScimResult<ScimServiceProviderConfig> {
  return decodeResource(text, SCIM_SERVICE_PROVIDER_CONFIG_CODEC, options);
}

// ─── ListResponse (RFC 7644 §3.4.2) ─────────────────────────────────

const ENVELOPE_KEYS = Object.keys(scimListResponseEnvelopeSchema.shape);

/**
 * Encode a ListResponse whose `Resources` are all of one type. Item failures
 * carry a `Resources[i]` path prefix.
 */
export function listResponseToJson<S extends z.AnyZodObject>(
  list: ScimListResponse<ScimDecoded<S>>,
  codec: ScimResourceCodec<S>,
  options: ScimEncodeOptions = {},
): ScimResult<string> {
  const resources: Record<string, unknown>[] = [];
  for (const [index, item] of list.Resources.entries()) {
    const wire = toWireObject(item, codec, options.registry);
    if (!wire.ok) return fail(withPathPrefix(wire.error, `Resources[${index}]`));
    resources.push(wire.value);
  }

  const envelope: Record<string, unknown> = {
    schemas: list.schemas,
    totalResults: list.totalResults,
  };
  if (list.startIndex !== undefined) envelope.startIndex = list.startIndex;
  if (list.itemsPerPage !== undefined) envelope.itemsPerPage = list.itemsPerPage;
  envelope.Resources = resources;

  return stringifyWireObject(envelope, options.pretty);
}

export function jsonToListResponse<S extends z.AnyZodObject>(
  text: string,
  codec: ScimResourceCodec<S>,
  options: ScimDecodeOptions,
): ScimResult<ScimListResponse<ScimDecoded<S>>> {
  const parsedText = parseJsonText(text);
  if (!parsedText.ok) return parsedText;
  const document = parsedText.value;
  if (!isRecord(document)) {
    return fail(new ScimSyntaxError('notAnObject', undefined, 'Expected a JSON object for ListResponse.'));
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document)) {
    const canonical = ENVELOPE_KEYS.find((name) => name.toLowerCase() === key.toLowerCase());
    if (canonical === undefined) {
      if (options.unknownAttributes === 'reject') {
        return fail(new ScimSchemaError('unknownAttribute', key, `Attribute '${key}' is not defined for ListResponse.`));
      }
      continue;
    }
    if (canonical in normalized) {
      return fail(
        new ScimSyntaxError('duplicateAttribute', canonical, `Attribute '${canonical}' appears more than once; attribute names are case-insensitive.`),
      );
    }
    normalized[canonical] = value;
  }

  const envelope = scimListResponseEnvelopeSchema.safeParse(normalized);
  if (!envelope.success) {
    const [issue] = envelope.error.issues;
    const path = issue.path.join('.');
    return fail(new ScimTypeMismatchError('invalidType', path, `Attribute '${path}': ${issue.message}`));
  }

  const { schemas, totalResults, startIndex, itemsPerPage, Resources } = envelope.data;
  if (!schemas?.some((urn) => urn.toLowerCase() === SCIM_LIST_RESPONSE_SCHEMA.toLowerCase())) {
    return fail(
      new ScimSchemaError('missingBaseSchema', 'schemas', `Attribute 'schemas' must include '${SCIM_LIST_RESPONSE_SCHEMA}'.`),
    );
  }
  if (totalResults === undefined || totalResults === null) {
    return fail(new ScimFieldError('requiredAttribute', 'totalResults', "Required attribute 'totalResults' is missing."));
  }

  const items: ScimDecoded<S>[] = [];
  for (const [index, item] of (Resources ?? []).entries()) {
    const decoded = decodeDocument(item, codec, options);
    if (!decoded.ok) return fail(withPathPrefix(decoded.error, `Resources[${index}]`));
    items.push(decoded.value);
  }

  const list: ScimListResponse<ScimDecoded<S>> = { schemas, totalResults, Resources: items };
  if (startIndex !== undefined && startIndex !== null) list.startIndex = startIndex;
  if (itemsPerPage !== undefined && itemsPerPage !== null) list.itemsPerPage = itemsPerPage;
  return ok(list);
}
