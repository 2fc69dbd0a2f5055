/**
 * ScimModule: dynamic module exposing the SCIM codec, validator and
 * discovery documents as injectable services.
 *
 * Usage:
 *   imports: [ScimModule.forRoot({ unknownAttributes: 'reject' })]
 */
import { Module, type DynamicModule } from '@nestjs/common';

import { LoggingModule } from '../logging/logging.module';
import { LogCategory } from '../logging/log-levels';
import { ScimLogger } from '../logging/scim-logger.service';
import {
  ENGINE_CONFIG_FLAGS,
  getConfigBoolean,
  getConfigString,
  validateEngineConfig,
  type ScimEngineConfig,
} from './config/scim-engine-config.interface';
import { ScimSchemaRegistry } from './schemas/scim-schema-registry';
import { ScimCodecService } from './services/scim-codec.service';
import { ScimDiscoveryService } from './services/scim-discovery.service';
import { ScimValidationService } from './services/scim-validation.service';
import { SCIM_ENGINE_CONFIG, SCIM_SCHEMA_REGISTRY } from './scim-module.tokens';

const ENGINE_LOG_CATEGORIES = [LogCategory.SCIM_CODEC, LogCategory.SCIM_VALIDATION, LogCategory.SCIM_SCHEMA];

@Module({})
export class ScimModule {
  /** Throws when `options` is invalid, before any provider is created. */
  static forRoot(options: ScimEngineConfig): DynamicModule {
    validateEngineConfig(options);

    return {
      module: ScimModule,
      imports: [LoggingModule],
      providers: [
        {
          provide: SCIM_ENGINE_CONFIG,
          useFactory: (logger: ScimLogger): ScimEngineConfig => {
            const level = getConfigString(options, ENGINE_CONFIG_FLAGS.LOG_LEVEL);
            if (level !== undefined) {
              for (const category of ENGINE_LOG_CATEGORIES) {
                logger.setCategoryLevel(category, level);
              }
            }
            return options;
          },
          inject: [ScimLogger],
        },
        {
          provide: SCIM_SCHEMA_REGISTRY,
          useFactory: (config: ScimEngineConfig, logger: ScimLogger): ScimSchemaRegistry => {
            let registry: ScimSchemaRegistry;
            try {
              registry = new ScimSchemaRegistry({
                enterpriseUserRequired: getConfigBoolean(config, ENGINE_CONFIG_FLAGS.ENTERPRISE_USER_REQUIRED),
                extensions: config.extensions,
              });
            } catch (error) {
              logger.error(LogCategory.SCIM_SCHEMA, 'Schema registry build failed', error);
              throw error;
            }
            logger.info(LogCategory.SCIM_SCHEMA, 'Schema registry built', {
              schemas: registry.getSchemas().map((schema) => schema.id),
            });
            return registry;
          },
          inject: [SCIM_ENGINE_CONFIG, ScimLogger],
        },
        ScimCodecService,
        ScimValidationService,
        ScimDiscoveryService,
      ],
      exports: [SCIM_ENGINE_CONFIG, SCIM_SCHEMA_REGISTRY, ScimCodecService, ScimValidationService, ScimDiscoveryService],
    };
  }
}
