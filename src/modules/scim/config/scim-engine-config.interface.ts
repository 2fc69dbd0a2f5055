import {
  SCIM_UNKNOWN_ATTRIBUTE_POLICIES,
  type ScimUnknownAttributePolicy,
} from '../codec/scim-resource-codec';
import { describeJsonType, isRecord } from '../common/scim-attribute-utils';
import { SCIM_RESOURCE_TYPE } from '../common/scim-constants';
import type { ScimExtensionRegistration } from '../schemas/scim-schema-registry';

/**
 * Engine Configuration Flag Constants
 *
 * Use these constants wherever a flag is read so the key spelling lives in one place.
 */
export const ENGINE_CONFIG_FLAGS = {
  /**
   * Decode strictness for attributes no schema defines: "reject", "ignore" or "preserve".
   * Required; there is no default.
   */
  UNKNOWN_ATTRIBUTES: 'unknownAttributes',

  /**
   * When true, encoded JSON is indented.
   */
  PRETTY_PRINT: 'prettyPrint',

  /**
   * Log level for the engine's log categories. Accepts a level name
   * ("TRACE", "DEBUG", "INFO", etc.) or numeric level (0-6).
   */
  LOG_LEVEL: 'logLevel',

  /**
   * When true, every User must carry the Enterprise User extension.
   */
  ENTERPRISE_USER_REQUIRED: 'enterpriseUserRequired',

  /**
   * Additional extension schemas bound to User or Group.
   */
  EXTENSIONS: 'extensions',
} as const;

export type EngineConfigFlag = typeof ENGINE_CONFIG_FLAGS[keyof typeof ENGINE_CONFIG_FLAGS];

export interface ScimEngineConfig {
  /**
   * Example config: { "unknownAttributes": "preserve" }
   */
  [ENGINE_CONFIG_FLAGS.UNKNOWN_ATTRIBUTES]: ScimUnknownAttributePolicy;

  /**
   * Example config: { "prettyPrint": "True" }
   */
  [ENGINE_CONFIG_FLAGS.PRETTY_PRINT]?: boolean | string;

  /**
   * Example config: { "logLevel": "DEBUG" }
   */
  [ENGINE_CONFIG_FLAGS.LOG_LEVEL]?: string | number;

  [ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED]?: boolean | string;

  [ENGINE_CONFIG_FLAGS.EXTENSIONS]?: readonly ScimExtensionRegistration[];
}

/**
 * Parse a flag as boolean. Handles string values like "True", "true", "1".
 */
export function getConfigBoolean(config: Partial<ScimEngineConfig> | undefined, key: EngineConfigFlag): boolean {
  if (!config) return false;

  const value: unknown = config[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return false;
}

export function getConfigString(config: Partial<ScimEngineConfig> | undefined, key: EngineConfigFlag): string | undefined {
  if (!config) return undefined;

  const value: unknown = config[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

const VALID_BOOLEAN_VALUES = ['true', 'false', '1', '0'];

const VALID_LOG_LEVEL_NAMES = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'off'];

function validateBooleanFlag(config: Record<string, unknown>, flag: EngineConfigFlag): void {
  const value = config[flag];
  if (value === undefined || typeof value === 'boolean') return;
  if (typeof value === 'string') {
    if (!VALID_BOOLEAN_VALUES.includes(value.toLowerCase())) {
      throw new Error(
        `Invalid value "${value}" for config flag "${flag}". ` +
        `Allowed values: "True", "False", true, false, "1", "0".`
      );
    }
    return;
  }
  throw new Error(
    `Invalid type for config flag "${flag}". ` +
    `Expected boolean or string ("True"/"False"), got ${typeof value}.`
  );
}

/**
 * Validate engine configuration. Throws an Error naming the first invalid flag.
 */
export function validateEngineConfig(config: unknown): asserts config is ScimEngineConfig {
  if (!isRecord(config)) {
    throw new Error(`Engine config must be an object with at least "${ENGINE_CONFIG_FLAGS.UNKNOWN_ATTRIBUTES}".`);
  }

  const policy = config[ENGINE_CONFIG_FLAGS.UNKNOWN_ATTRIBUTES];
  if (typeof policy !== 'string' || !SCIM_UNKNOWN_ATTRIBUTE_POLICIES.some((allowed) => allowed === policy)) {
    throw new Error(
      `Invalid value "${String(policy)}" for config flag "${ENGINE_CONFIG_FLAGS.UNKNOWN_ATTRIBUTES}". ` +
      `Allowed values: "reject", "ignore", "preserve".`
    );
  }

  validateBooleanFlag(config, ENGINE_CONFIG_FLAGS.PRETTY_PRINT);
  validateBooleanFlag(config, ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED);

  const logLevelFlag = config[ENGINE_CONFIG_FLAGS.LOG_LEVEL];
  if (logLevelFlag !== undefined) {
    if (typeof logLevelFlag === 'string') {
      if (!VALID_LOG_LEVEL_NAMES.includes(logLevelFlag.toLowerCase())) {
        throw new Error(
          `Invalid value "${logLevelFlag}" for config flag "${ENGINE_CONFIG_FLAGS.LOG_LEVEL}". ` +
          `Allowed values: "TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL", "OFF" (case-insensitive).`
        );
      }
    } else if (typeof logLevelFlag === 'number') {
      if (!Number.isInteger(logLevelFlag) || logLevelFlag < 0 || logLevelFlag > 6) {
        throw new Error(
          `Invalid numeric value ${logLevelFlag} for config flag "${ENGINE_CONFIG_FLAGS.LOG_LEVEL}". ` +
          `Allowed range: 0 (TRACE) through 6 (OFF).`
        );
      }
    } else {
      throw new Error(
        `Invalid type for config flag "${ENGINE_CONFIG_FLAGS.LOG_LEVEL}". ` +
        `Expected string ("TRACE"/"DEBUG"/"INFO"/"WARN"/"ERROR"/"FATAL"/"OFF") or number (0-6), got ${typeof logLevelFlag}.`
      );
    }
  }

  const extensions = config[ENGINE_CONFIG_FLAGS.EXTENSIONS];
  if (extensions !== undefined) {
    if (!Array.isArray(extensions)) {
      throw new Error(
        `Invalid type for config flag "${ENGINE_CONFIG_FLAGS.EXTENSIONS}". Expected an array of extension registrations, got ${typeof extensions}.`
      );
    }
    extensions.forEach((registration: unknown, index: number) => validateExtensionRegistration(registration, index));
  }
}

const EXTENSION_RESOURCE_TYPES: readonly string[] = [SCIM_RESOURCE_TYPE.USER, SCIM_RESOURCE_TYPE.GROUP];

function validateExtensionRegistration(registration: unknown, index: number): void {
  const at = `${ENGINE_CONFIG_FLAGS.EXTENSIONS}[${index}]`;
  if (!isRecord(registration)) {
    throw new Error(`Invalid extension registration "${at}". Expected an object, got ${describeJsonType(registration)}.`);
  }

  const resourceType = registration.resourceType;
  if (typeof resourceType !== 'string' || !EXTENSION_RESOURCE_TYPES.includes(resourceType)) {
    throw new Error(
      `Invalid value "${String(resourceType)}" for "${at}.resourceType". Allowed values: "User", "Group".`
    );
  }
  if (!isRecord(registration.schema)) {
    throw new Error(
      `Invalid type for "${at}.schema". Expected a schema representation object, got ${describeJsonType(registration.schema)}.`
    );
  }
  if (registration.required !== undefined && typeof registration.required !== 'boolean') {
    throw new Error(`Invalid type for "${at}.required". Expected boolean, got ${describeJsonType(registration.required)}.`);
  }
}
