import 'reflect-metadata';

export * from './modules/scim/common/scim-constants';
export * from './modules/scim/common/scim-errors';
export * from './modules/scim/common/scim-types';
export * from './modules/scim/common/scim-wire-schemas';
export * from './modules/scim/common/scim-extensions';
export * from './modules/scim/common/scim-attribute-utils';
export * from './modules/scim/schemas/scim-schema-definitions';
export * from './modules/scim/schemas/scim-schema-registry';
export * from './modules/scim/validation/scim-rule-evaluator';
export * from './modules/scim/validation/scim-resource-validators';
export * from './modules/scim/codec/scim-resource-codec';
export * from './modules/scim/codec/scim-json-codec';
export * from './modules/scim/codec/scim-search-request-codec';
export * from './modules/scim/config/scim-engine-config.interface';
export * from './modules/scim/services/scim-codec.service';
export * from './modules/scim/services/scim-validation.service';
export * from './modules/scim/services/scim-discovery.service';
export * from './modules/scim/scim-module.tokens';
export * from './modules/scim/scim.module';
export * from './modules/logging/log-levels';
export * from './modules/logging/scim-logger.service';
export * from './modules/logging/logging.module';
