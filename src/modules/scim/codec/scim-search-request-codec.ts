/**
 * SCIM query messages (RFC 7644 §3.4.2, §3.4.3).
 *
 * A list query reaches a service provider either as URL query parameters on
 * a GET or as a SearchRequest body POSTed to `/.search`. Both decode to the
 * same paging semantics: `startIndex` defaults to 1 and is raised to 1 when
 * lower; `count` defaults to 100 and is raised to 0 when negative.
 */
import { isRecord } from '../common/scim-attribute-utils';
import {
  SCIM_DEFAULT_COUNT,
  SCIM_DEFAULT_START_INDEX,
  SCIM_SEARCH_REQUEST_SCHEMA,
} from '../common/scim-constants';
import {
  fail,
  ok,
  ScimFieldError,
  ScimSchemaError,
  ScimSyntaxError,
  ScimTypeMismatchError,
  type ScimResult,
} from '../common/scim-errors';
import type { ScimListQuery, ScimSearchRequest, ScimSortOrder } from '../common/scim-types';
import { scimSearchRequestSchema } from '../common/scim-wire-schemas';
import { parseJsonText, stringifyWireObject, type ScimUnknownAttributePolicy } from './scim-resource-codec';

const SEARCH_REQUEST_KEYS = Object.keys(scimSearchRequestSchema.shape);

const SORT_ORDERS: readonly ScimSortOrder[] = ['ascending', 'descending'];

function clampStartIndex(value: number | null | undefined): number {
  if (value === undefined || value === null) return SCIM_DEFAULT_START_INDEX;
  return Math.max(value, 1);
}

function clampCount(value: number | null | undefined): number {
  if (value === undefined || value === null) return SCIM_DEFAULT_COUNT;
  return Math.max(value, 0);
}

// ─── SearchRequest ──────────────────────────────────────────────────

/** A SearchRequest with its schema URN and the default paging. */
export function createSearchRequest(fields: Omit<ScimSearchRequest, 'schemas'> = {}): ScimSearchRequest {
  return {
    schemas: [SCIM_SEARCH_REQUEST_SCHEMA],
    startIndex: SCIM_DEFAULT_START_INDEX,
    count: SCIM_DEFAULT_COUNT,
    ...fields,
  };
}

export function searchRequestToJson(request: ScimSearchRequest, options: { pretty?: boolean } = {}): ScimResult<string> {
  const parsed = scimSearchRequestSchema.safeParse(request);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = issue.path.join('.');
    return fail(new ScimTypeMismatchError('invalidType', path, `Attribute '${path}': ${issue.message}`));
  }
  return stringifyWireObject(parsed.data, options.pretty);
}

/**
 * Decode a SearchRequest body. Names match case-insensitively; `schemas`
 * must carry the SearchRequest URN. Unknown attributes are rejected under
 * `reject` and dropped otherwise: a SearchRequest has nowhere to keep them.
 * The result always has `startIndex` and `count`.
 */
export function jsonToSearchRequest(
  text: string,
  options: { unknownAttributes: ScimUnknownAttributePolicy },
): ScimResult<ScimSearchRequest> {
  const parsedText = parseJsonText(text);
  if (!parsedText.ok) return parsedText;
  const document = parsedText.value;
  if (!isRecord(document)) {
    return fail(new ScimSyntaxError('notAnObject', undefined, 'Expected a JSON object for SearchRequest.'));
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document)) {
    const canonical = SEARCH_REQUEST_KEYS.find((name) => name.toLowerCase() === key.toLowerCase());
    if (canonical === undefined) {
      if (options.unknownAttributes === 'reject') {
        return fail(new ScimSchemaError('unknownAttribute', key, `Attribute '${key}' is not defined for SearchRequest.`));
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

  const parsed = scimSearchRequestSchema.safeParse(normalized);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = issue.path.join('.');
    return fail(new ScimTypeMismatchError('invalidType', path, `Attribute '${path}': ${issue.message}`));
  }

  const request = parsed.data;
  if (!request.schemas?.some((urn) => urn.toLowerCase() === SCIM_SEARCH_REQUEST_SCHEMA.toLowerCase())) {
    return fail(
      new ScimSchemaError('missingBaseSchema', 'schemas', `Attribute 'schemas' must include '${SCIM_SEARCH_REQUEST_SCHEMA}'.`),
    );
  }

  return ok({
    ...request,
    startIndex: clampStartIndex(request.startIndex),
    count: clampCount(request.count),
  });
}

// ─── List query parameters ──────────────────────────────────────────

export type ScimQueryParams = Readonly<Record<string, string | undefined>>;

function parseIntegerParam(params: ScimQueryParams, name: 'startIndex' | 'count'): ScimResult<number | undefined> {
  const raw = params[name];
  if (raw === undefined || raw.trim() === '') return ok(undefined);
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    return fail(new ScimTypeMismatchError('invalidType', name, `Query parameter '${name}' expected integer, received '${raw}'.`));
  }
  return ok(Number.parseInt(raw, 10));
}

function parseAttributeList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const names = raw.split(',').map((name) => name.trim()).filter((name) => name.length > 0);
  return names.length > 0 ? names : undefined;
}

/**
 * Read the list query parameters of a GET request. Comma-separated
 * `attributes` / `excludedAttributes` become arrays; an empty `filter` is
 * the same as none.
 */
export function parseListQuery(params: ScimQueryParams): ScimResult<ScimListQuery> {
  const startIndex = parseIntegerParam(params, 'startIndex');
  if (!startIndex.ok) return startIndex;
  const count = parseIntegerParam(params, 'count');
  if (!count.ok) return count;

  const query: ScimListQuery = {
    startIndex: clampStartIndex(startIndex.value),
    count: clampCount(count.value),
  };

  const filter = params.filter?.trim();
  if (filter) query.filter = filter;
  const attributes = parseAttributeList(params.attributes);
  if (attributes) query.attributes = attributes;
  const excludedAttributes = parseAttributeList(params.excludedAttributes);
  if (excludedAttributes) query.excludedAttributes = excludedAttributes;
  if (params.sortBy) query.sortBy = params.sortBy;

  const sortOrder = params.sortOrder;
  if (sortOrder !== undefined) {
    const order = SORT_ORDERS.find((candidate) => candidate === sortOrder);
    if (!order) {
      return fail(
        new ScimFieldError('canonicalValue', 'sortOrder', `Query parameter 'sortOrder' has value '${sortOrder}'; expected one of: ascending, descending.`),
      );
    }
    query.sortOrder = order;
  }
  return ok(query);
}

/** The SearchRequest body equivalent to a list query. */
export function listQueryToSearchRequest(query: ScimListQuery): ScimSearchRequest {
  const request = createSearchRequest();
  if (query.attributes) request.attributes = query.attributes;
  if (query.excludedAttributes) request.excludedAttributes = query.excludedAttributes;
  if (query.filter !== undefined) request.filter = query.filter;
  if (query.sortBy !== undefined) request.sortBy = query.sortBy;
  if (query.sortOrder !== undefined) request.sortOrder = query.sortOrder;
  request.startIndex = query.startIndex;
  request.count = query.count;
  return request;
}
