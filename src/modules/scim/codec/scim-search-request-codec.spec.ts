import { SCIM_SEARCH_REQUEST_SCHEMA } from '../common/scim-constants';
import type { ScimResult } from '../common/scim-errors';
import {
  createSearchRequest,
  jsonToSearchRequest,
  listQueryToSearchRequest,
  parseListQuery,
  searchRequestToJson,
} from './scim-search-request-codec';

function errorOf<T>(result: ScimResult<T>): { kind: string; rule: string; path?: string; message: string } | undefined {
  if (result.ok) return undefined;
  return { kind: result.error.kind, rule: result.error.rule, path: result.error.path, message: result.error.message };
}

function valueOf<T>(result: ScimResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

const reject = { unknownAttributes: 'reject' as const };

describe('scim-search-request-codec', () => {
  // ─── SearchRequest ────────────────────────────────────────────────

  describe('createSearchRequest', () => {
    it('should carry the SearchRequest URN and the default paging', () => {
      expect(createSearchRequest()).toEqual({ schemas: [SCIM_SEARCH_REQUEST_SCHEMA], startIndex: 1, count: 100 });
    });

    it('should let fields override the defaults', () => {
      expect(createSearchRequest({ filter: 'active eq true', count: 10 })).toEqual({
        schemas: [SCIM_SEARCH_REQUEST_SCHEMA],
        filter: 'active eq true',
        startIndex: 1,
        count: 10,
      });
    });
  });

  describe('searchRequestToJson', () => {
    it('should write attributes in message order', () => {
      const request = createSearchRequest({ filter: 'active eq true', attributes: ['userName', 'emails'] });
      expect(valueOf(searchRequestToJson(request))).toBe(
        `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"attributes":["userName","emails"],"filter":"active eq true","startIndex":1,"count":100}`,
      );
    });

    it('should decode what it encodes', () => {
      const request = createSearchRequest({ filter: 'active eq true', sortBy: 'userName', sortOrder: 'descending' });
      const text = valueOf(searchRequestToJson(request));
      expect(valueOf(jsonToSearchRequest(text, reject))).toEqual(request);
    });
  });

  describe('jsonToSearchRequest', () => {
    it('should match names case-insensitively and fill in startIndex', () => {
      const text = `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"Filter":"active eq true","COUNT":10}`;
      expect(valueOf(jsonToSearchRequest(text, reject))).toEqual({
        schemas: [SCIM_SEARCH_REQUEST_SCHEMA],
        filter: 'active eq true',
        startIndex: 1,
        count: 10,
      });
    });

    it('should raise startIndex to 1 and count to 0', () => {
      const text = `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"startIndex":0,"count":-5}`;
      const request = valueOf(jsonToSearchRequest(text, reject));
      expect(request.startIndex).toBe(1);
      expect(request.count).toBe(0);
    });

    it('should require the SearchRequest schema URN', () => {
      expect(errorOf(jsonToSearchRequest('{"filter":"active eq true"}', reject))).toEqual({
        kind: 'schema',
        rule: 'missingBaseSchema',
        path: 'schemas',
        message: `Attribute 'schemas' must include '${SCIM_SEARCH_REQUEST_SCHEMA}'.`,
      });
    });

    it('should reject unknown attributes under reject and drop them otherwise', () => {
      const text = `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"limit":5}`;
      expect(errorOf(jsonToSearchRequest(text, reject))).toEqual({
        kind: 'schema',
        rule: 'unknownAttribute',
        path: 'limit',
        message: "Attribute 'limit' is not defined for SearchRequest.",
      });
      expect(valueOf(jsonToSearchRequest(text, { unknownAttributes: 'ignore' }))).toEqual({
        schemas: [SCIM_SEARCH_REQUEST_SCHEMA],
        startIndex: 1,
        count: 100,
      });
    });

    it('should reject the same attribute under two spellings', () => {
      const text = `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"count":1,"Count":2}`;
      expect(errorOf(jsonToSearchRequest(text, reject))).toEqual({
        kind: 'syntax',
        rule: 'duplicateAttribute',
        path: 'count',
        message: "Attribute 'count' appears more than once; attribute names are case-insensitive.",
      });
    });

    it('should report type mismatches with the attribute path', () => {
      const badCount = errorOf(jsonToSearchRequest(`{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"count":"ten"}`, reject));
      expect(badCount).toEqual({
        kind: 'typeMismatch',
        rule: 'invalidType',
        path: 'count',
        message: "Attribute 'count': Expected number, received string",
      });
      const badOrder = errorOf(jsonToSearchRequest(`{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"sortOrder":"up"}`, reject));
      expect(badOrder?.path).toBe('sortOrder');
    });

    it('should reject a body that is not an object', () => {
      expect(errorOf(jsonToSearchRequest('[]', reject))).toEqual({
        kind: 'syntax',
        rule: 'notAnObject',
        path: undefined,
        message: 'Expected a JSON object for SearchRequest.',
      });
    });
  });

  // ─── List query parameters ────────────────────────────────────────

  describe('parseListQuery', () => {
    it('should apply the paging defaults to an empty query', () => {
      expect(valueOf(parseListQuery({}))).toEqual({ startIndex: 1, count: 100 });
    });

    it('should read every parameter', () => {
      const query = valueOf(
        parseListQuery({
          filter: ' userName sw "j" ',
          startIndex: '11',
          count: '25',
          attributes: 'userName, emails,',
          excludedAttributes: '',
          sortBy: 'userName',
          sortOrder: 'descending',
        }),
      );
      expect(query).toEqual({
        filter: 'userName sw "j"',
        startIndex: 11,
        count: 25,
        attributes: ['userName', 'emails'],
        sortBy: 'userName',
        sortOrder: 'descending',
      });
      expect('excludedAttributes' in query).toBe(false);
    });

    it('should treat an empty filter as none', () => {
      expect('filter' in valueOf(parseListQuery({ filter: '' }))).toBe(false);
    });

    it('should raise out-of-range paging values', () => {
      expect(valueOf(parseListQuery({ startIndex: '-3', count: '-1' }))).toEqual({ startIndex: 1, count: 0 });
    });

    it('should reject paging values that are not integers', () => {
      expect(errorOf(parseListQuery({ startIndex: 'abc' }))).toEqual({
        kind: 'typeMismatch',
        rule: 'invalidType',
        path: 'startIndex',
        message: "Query parameter 'startIndex' expected integer, received 'abc'.",
      });
      expect(errorOf(parseListQuery({ count: '1.5' }))?.path).toBe('count');
    });

    it('should reject an unknown sort order', () => {
      expect(errorOf(parseListQuery({ sortOrder: 'up' }))).toEqual({
        kind: 'field',
        rule: 'canonicalValue',
        path: 'sortOrder',
        message: "Query parameter 'sortOrder' has value 'up'; expected one of: ascending, descending.",
      });
    });
  });

  describe('listQueryToSearchRequest', () => {
    it('should build the equivalent SearchRequest body', () => {
      const request = listQueryToSearchRequest({ startIndex: 11, count: 25, filter: 'active eq true', attributes: ['userName'] });
      expect(valueOf(searchRequestToJson(request))).toBe(
        `{"schemas":["${SCIM_SEARCH_REQUEST_SCHEMA}"],"attributes":["userName"],"filter":"active eq true","startIndex":11,"count":25}`,
      );
    });
  });
});
