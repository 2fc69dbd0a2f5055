import { Test, TestingModule } from '@nestjs/testing';

import { ScimLogger } from '../../logging/scim-logger.service';
import {
  SCIM_CORE_GROUP_SCHEMA,
  SCIM_CORE_USER_SCHEMA,
  SCIM_ENTERPRISE_USER_SCHEMA,
} from '../common/scim-constants';
import { buildServiceProviderConfig, ScimSchemaRegistry } from '../schemas/scim-schema-registry';
import { SCIM_SCHEMA_REGISTRY } from '../scim-module.tokens';
import { ScimValidationService } from './scim-validation.service';

describe('ScimValidationService', () => {
  let mockLogger: { trace: jest.Mock; debug: jest.Mock };

  async function createService(registry: ScimSchemaRegistry = new ScimSchemaRegistry()): Promise<ScimValidationService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ScimValidationService,
        { provide: SCIM_SCHEMA_REGISTRY, useValue: registry },
        { provide: ScimLogger, useValue: mockLogger },
      ],
    }).compile();
    return module.get<ScimValidationService>(ScimValidationService);
  }

  beforeEach(() => {
    mockLogger = { trace: jest.fn(), debug: jest.fn() };
  });

  it('should trace a passing validation', async () => {
    const service = await createService();
    expect(service.validateUser({ schemas: [SCIM_CORE_USER_SCHEMA], userName: 'jdoe' }).ok).toBe(true);
    expect(mockLogger.trace).toHaveBeenCalledWith('scim.validation', 'Validation passed', { resourceType: 'User' });
    expect(mockLogger.debug).not.toHaveBeenCalled();
  });

  it('should log a failing validation at debug', async () => {
    const service = await createService();
    const result = service.validateGroup({ schemas: [SCIM_CORE_GROUP_SCHEMA] });
    expect(result.ok).toBe(false);
    expect(mockLogger.debug).toHaveBeenCalledWith('scim.validation', 'Validation failed', {
      resourceType: 'Group',
      kind: 'field',
      rule: 'requiredAttribute',
      path: 'displayName',
      detail: "Required attribute 'displayName' is missing or empty.",
    });
  });

  it('should validate against the injected registry', async () => {
    const service = await createService(new ScimSchemaRegistry({ enterpriseUserRequired: true }));
    const result = service.validateUser({ schemas: [SCIM_CORE_USER_SCHEMA], userName: 'jdoe' });
    expect(result.ok ? undefined : result.error.rule).toBe('missingExtension');
  });

  it('should pass the mode through', async () => {
    const service = await createService();
    const user = { schemas: [SCIM_CORE_USER_SCHEMA], id: 'u-1', userName: 'jdoe' };
    expect(service.validateUser(user).ok).toBe(true);
    const created = service.validateUser(user, 'create');
    expect(created.ok ? undefined : created.error.rule).toBe('readOnlyAttribute');
    const group = { schemas: [SCIM_CORE_GROUP_SCHEMA], id: 'g-1', displayName: 'Ops' };
    const createdGroup = service.validateGroup(group, 'create');
    expect(createdGroup.ok ? undefined : createdGroup.error.path).toBe('id');
  });

  it('should validate discovery documents and enterprise payloads', async () => {
    const service = await createService();
    const [userType] = new ScimSchemaRegistry().getResourceTypes();
    if (!userType) throw new Error('no resource types');
    expect(service.validateResourceType(userType).ok).toBe(true);
    expect(service.validateServiceProviderConfig(buildServiceProviderConfig()).ok).toBe(true);
    expect(service.validateEnterpriseUser({ manager: { displayName: 'Boss' } }, { requireAllFields: false }).ok).toBe(true);
    const incomplete = service.validateEnterpriseUser({ department: 'Sales' });
    expect(incomplete.ok ? undefined : incomplete.error.path).toBe('employeeNumber');

    const result = service.validateEnterpriseUser(
      { manager: { displayName: 'Boss' } },
      { mode: 'create', requireAllFields: false },
    );
    expect(result.ok ? undefined : result.error.path).toBe('manager.displayName');
    expect(mockLogger.debug).toHaveBeenCalledWith(
      'scim.validation',
      'Validation failed',
      expect.objectContaining({ resourceType: 'EnterpriseUser', rule: 'readOnlyAttribute' }),
    );
  });

  it('should keep the enterprise URN out of bare payload paths', async () => {
    const service = await createService();
    const user = {
      schemas: [SCIM_CORE_USER_SCHEMA, SCIM_ENTERPRISE_USER_SCHEMA],
      userName: 'jdoe',
      extensions: { [SCIM_ENTERPRISE_USER_SCHEMA]: { manager: { displayName: 'Boss' } } },
    };
    const result = service.validateUser(user, 'create');
    expect(result.ok ? undefined : result.error.path).toBe(`${SCIM_ENTERPRISE_USER_SCHEMA}:manager.displayName`);
  });
});
