import { Inject, Injectable } from '@nestjs/common';

import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import type { ScimResult } from '../common/scim-errors';
import type {
  ScimEnterpriseUser,
  ScimGroup,
  ScimResourceType,
  ScimServiceProviderConfig,
  ScimUser,
} from '../common/scim-types';
import { ScimSchemaRegistry } from '../schemas/scim-schema-registry';
import { SCIM_SCHEMA_REGISTRY } from '../scim-module.tokens';
import type { ScimValidationMode } from '../validation/scim-rule-evaluator';
import {
  validateEnterpriseUser,
  validateGroup,
  validateResourceType,
  validateServiceProviderConfig,
  validateUser,
  type ScimEnterpriseUserValidationOptions,
} from '../validation/scim-resource-validators';

/**
 * Resource validation against the module's schema registry. Failures are
 * returned as values and logged at DEBUG under `scim.validation`.
 */
@Injectable()
export class ScimValidationService {
  constructor(
    @Inject(SCIM_SCHEMA_REGISTRY) private readonly registry: ScimSchemaRegistry,
    private readonly logger: ScimLogger,
  ) {}

  validateUser(user: ScimUser, mode?: ScimValidationMode): ScimResult<void> {
    return this.report('User', validateUser(user, { mode, registry: this.registry }));
  }

  validateGroup(group: ScimGroup, mode?: ScimValidationMode): ScimResult<void> {
    return this.report('Group', validateGroup(group, { mode, registry: this.registry }));
  }

  validateResourceType(resourceType: ScimResourceType): ScimResult<void> {
    return this.report('ResourceType', validateResourceType(resourceType));
  }

  validateServiceProviderConfig(config: ScimServiceProviderConfig): ScimResult<void> {
    return this.report('ServiceProviderConfig', validateServiceProviderConfig(config));
  }

  validateEnterpriseUser(extension: ScimEnterpriseUser, options: ScimEnterpriseUserValidationOptions = {}): ScimResult<void> {
    return this.report('EnterpriseUser', validateEnterpriseUser(extension, options));
  }

  private report(resourceType: string, result: ScimResult<void>): ScimResult<void> {
    if (result.ok) {
      this.logger.trace(LogCategory.SCIM_VALIDATION, 'Validation passed', { resourceType });
    } else {
      this.logger.debug(LogCategory.SCIM_VALIDATION, 'Validation failed', {
        resourceType,
        kind: result.error.kind,
        rule: result.error.rule,
        path: result.error.path,
        detail: result.error.message,
      });
    }
    return result;
  }
}
