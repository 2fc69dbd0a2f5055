import {
  ENGINE_CONFIG_FLAGS,
  getConfigBoolean,
  getConfigString,
  validateEngineConfig,
  type ScimEngineConfig,
} from './scim-engine-config.interface';

describe('scim-engine-config', () => {
  // ─── getConfigBoolean ─────────────────────────────────────────────

  describe('getConfigBoolean', () => {
    it('should return false for a missing config or flag', () => {
      expect(getConfigBoolean(undefined, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(false);
      expect(getConfigBoolean({ unknownAttributes: 'reject' }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(false);
    });

    it('should return boolean values as they are', () => {
      expect(getConfigBoolean({ prettyPrint: true }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(true);
      expect(getConfigBoolean({ prettyPrint: false }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(false);
    });

    it('should parse "True", "true" and "1" as true', () => {
      expect(getConfigBoolean({ enterpriseUserRequired: 'True' }, ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED)).toBe(true);
      expect(getConfigBoolean({ enterpriseUserRequired: 'true' }, ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED)).toBe(true);
      expect(getConfigBoolean({ enterpriseUserRequired: '1' }, ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED)).toBe(true);
    });

    it('should parse other strings as false', () => {
      expect(getConfigBoolean({ prettyPrint: 'False' }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(false);
      expect(getConfigBoolean({ prettyPrint: '0' }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBe(false);
    });
  });

  // ─── getConfigString ──────────────────────────────────────────────

  describe('getConfigString', () => {
    it('should return strings and stringified numbers', () => {
      expect(getConfigString({ logLevel: 'DEBUG' }, ENGINE_CONFIG_FLAGS.LOG_LEVEL)).toBe('DEBUG');
      expect(getConfigString({ logLevel: 0 }, ENGINE_CONFIG_FLAGS.LOG_LEVEL)).toBe('0');
    });

    it('should return undefined for other values', () => {
      expect(getConfigString(undefined, ENGINE_CONFIG_FLAGS.LOG_LEVEL)).toBeUndefined();
      expect(getConfigString({ prettyPrint: true }, ENGINE_CONFIG_FLAGS.PRETTY_PRINT)).toBeUndefined();
    });
  });

  // ─── validateEngineConfig ─────────────────────────────────────────

  describe('validateEngineConfig', () => {
    it('should accept each unknown-attribute policy', () => {
      for (const unknownAttributes of ['reject', 'ignore', 'preserve']) {
        expect(() => validateEngineConfig({ unknownAttributes })).not.toThrow();
      }
    });

    it('should accept a complete config', () => {
      const config: ScimEngineConfig = {
        unknownAttributes: 'preserve',
        prettyPrint: 'True',
        logLevel: 'debug',
        enterpriseUserRequired: false,
        extensions: [],
      };
      expect(() => validateEngineConfig(config)).not.toThrow();
    });

    it('should reject a non-object config', () => {
      expect(() => validateEngineConfig(undefined)).toThrow(
        'Engine config must be an object with at least "unknownAttributes".',
      );
      expect(() => validateEngineConfig(['reject'])).toThrow(
        'Engine config must be an object with at least "unknownAttributes".',
      );
    });

    it('should require an unknown-attribute policy', () => {
      expect(() => validateEngineConfig({})).toThrow(
        'Invalid value "undefined" for config flag "unknownAttributes". Allowed values: "reject", "ignore", "preserve".',
      );
    });

    it('should reject an unknown policy', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'strict' })).toThrow(
        'Invalid value "strict" for config flag "unknownAttributes". Allowed values: "reject", "ignore", "preserve".',
      );
    });

    it('should reject an invalid boolean string', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', prettyPrint: 'yes' })).toThrow(
        'Invalid value "yes" for config flag "prettyPrint". Allowed values: "True", "False", true, false, "1", "0".',
      );
    });

    it('should reject a boolean flag of the wrong type', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', enterpriseUserRequired: 1 })).toThrow(
        'Invalid type for config flag "enterpriseUserRequired". Expected boolean or string ("True"/"False"), got number.',
      );
    });

    it('should accept level names and numeric levels', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: 'TRACE' })).not.toThrow();
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: 6 })).not.toThrow();
    });

    it('should reject an unknown level name', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: 'VERBOSE' })).toThrow(
        'Invalid value "VERBOSE" for config flag "logLevel".',
      );
    });

    it('should reject an out-of-range numeric level', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: 7 })).toThrow(
        'Invalid numeric value 7 for config flag "logLevel". Allowed range: 0 (TRACE) through 6 (OFF).',
      );
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: 1.5 })).toThrow('Invalid numeric value 1.5');
    });

    it('should reject a level of another type', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', logLevel: true })).toThrow(
        'Invalid type for config flag "logLevel".',
      );
    });

    it('should reject extensions that are not a list', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', extensions: {} })).toThrow(
        'Invalid type for config flag "extensions". Expected an array of extension registrations, got object.',
      );
    });

    it('should reject a registration that is not an object', () => {
      expect(() => validateEngineConfig({ unknownAttributes: 'reject', extensions: [null] })).toThrow(
        'Invalid extension registration "extensions[0]". Expected an object, got null.',
      );
    });

    it('should reject a registration for a resource type other than User or Group', () => {
      const schema = { id: 'urn:example:badge', name: 'Badge', attributes: [] };
      expect(() =>
        validateEngineConfig({
          unknownAttributes: 'reject',
          extensions: [{ resourceType: 'Group', schema }, { resourceType: 'user', schema }],
        }),
      ).toThrow('Invalid value "user" for "extensions[1].resourceType". Allowed values: "User", "Group".');
      expect(() =>
        validateEngineConfig({ unknownAttributes: 'reject', extensions: [{ resourceType: 'ResourceType', schema }] }),
      ).toThrow('Invalid value "ResourceType" for "extensions[0].resourceType". Allowed values: "User", "Group".');
    });

    it('should reject a registration without a schema object', () => {
      expect(() =>
        validateEngineConfig({ unknownAttributes: 'reject', extensions: [{ resourceType: 'User', schema: 'badge' }] }),
      ).toThrow('Invalid type for "extensions[0].schema". Expected a schema representation object, got string.');
    });

    it('should reject a non-boolean required flag on a registration', () => {
      const schema = { id: 'urn:example:badge', name: 'Badge', attributes: [] };
      expect(() =>
        validateEngineConfig({ unknownAttributes: 'reject', extensions: [{ resourceType: 'User', schema, required: 'yes' }] }),
      ).toThrow('Invalid type for "extensions[0].required". Expected boolean, got string.');
    });
  });
});
