/**
 * Fixture factories for E2E tests.
 *
 * Every factory returns a fresh object with unique values (using a counter)
 * and accepts an `overrides` spread so individual tests can tweak fields.
 * Factories return plain JSON objects; tests serialize them and feed the
 * text through the codec the way a client request would arrive.
 */

let counter = 0;

function nextId(): number {
  return ++counter;
}

/** Reset the counter between test suites if needed. */
export function resetFixtureCounter(): void {
  counter = 0;
}

export const USER_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const GROUP_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const ENTERPRISE_SCHEMA = 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User';
export const LIST_RESPONSE_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:ListResponse';

// ────────────────────── Users ──────────────────────

export interface UserFixture {
  schemas: string[];
  userName: string;
  externalId?: string;
  active?: boolean;
  name?: { givenName?: string; familyName?: string };
  emails?: Array<{ value: string; type?: string; primary?: boolean }>;
  [key: string]: unknown;
}

export function validUser(overrides: Partial<UserFixture> = {}): UserFixture {
  const n = nextId();
  return {
    schemas: [USER_SCHEMA],
    userName: `e2euser${n}@example.com`,
    externalId: `ext-user-${n}`,
    active: true,
    name: { givenName: 'Test', familyName: `User${n}` },
    emails: [{ value: `e2euser${n}@example.com`, type: 'work', primary: true }],
    ...overrides,
  };
}

export function enterpriseUser(
  enterprise: Record<string, unknown> = {},
  overrides: Partial<UserFixture> = {},
): UserFixture {
  const n = nextId();
  return validUser({
    schemas: [USER_SCHEMA, ENTERPRISE_SCHEMA],
    [ENTERPRISE_SCHEMA]: {
      employeeNumber: `EMP-${n}`,
      department: 'Engineering',
      ...enterprise,
    },
    ...overrides,
  });
}

// ────────────────────── Groups ──────────────────────

export interface GroupFixture {
  schemas: string[];
  displayName: string;
  members?: Array<{ value: string; type?: string; $ref?: string; display?: string }>;
  [key: string]: unknown;
}

export function validGroup(overrides: Partial<GroupFixture> = {}): GroupFixture {
  const n = nextId();
  return {
    schemas: [GROUP_SCHEMA],
    displayName: `E2E Group ${n}`,
    ...overrides,
  };
}

// ────────────────────── ListResponse ──────────────────────

export function listResponse(resources: unknown[], overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    schemas: [LIST_RESPONSE_SCHEMA],
    totalResults: resources.length,
    startIndex: 1,
    itemsPerPage: resources.length,
    Resources: resources,
    ...overrides,
  };
}
