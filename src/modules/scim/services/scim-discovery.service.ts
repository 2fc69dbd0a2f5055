import { Inject, Injectable } from '@nestjs/common';

import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import { SCIM_LIST_RESPONSE_SCHEMA } from '../common/scim-constants';
import type { ScimListResponse, ScimResourceType, ScimServiceProviderConfig } from '../common/scim-types';
import type { ScimSchemaDefinition } from '../schemas/scim-schema-definitions';
import { buildServiceProviderConfig, ScimSchemaRegistry } from '../schemas/scim-schema-registry';
import { SCIM_SCHEMA_REGISTRY } from '../scim-module.tokens';

/**
 * Discovery documents (RFC 7644 §4) derived from the module's registry:
 * `/Schemas`, `/ResourceTypes` and `/ServiceProviderConfig` bodies.
 */
@Injectable()
export class ScimDiscoveryService {
  constructor(
    @Inject(SCIM_SCHEMA_REGISTRY) private readonly registry: ScimSchemaRegistry,
    private readonly logger: ScimLogger,
  ) {}

  getSchemas(): ScimListResponse<ScimSchemaDefinition & { schemas: string[] }> {
    const list = this.registry.getSchemasListResponse();
    this.logger.debug(LogCategory.SCIM_SCHEMA, 'Schemas listed', { totalResults: list.totalResults });
    return list;
  }

  getResourceTypes(): ScimListResponse<ScimResourceType> {
    const resourceTypes = this.registry.getResourceTypes();
    this.logger.debug(LogCategory.SCIM_SCHEMA, 'Resource types listed', {
      names: resourceTypes.map((rt) => rt.name),
    });
    return {
      schemas: [SCIM_LIST_RESPONSE_SCHEMA],
      totalResults: resourceTypes.length,
      startIndex: 1,
      itemsPerPage: resourceTypes.length,
      Resources: resourceTypes,
    };
  }

  getServiceProviderConfig(
    overrides: Partial<Omit<ScimServiceProviderConfig, 'schemas'>> = {},
  ): ScimServiceProviderConfig {
    return buildServiceProviderConfig(overrides);
  }
}
