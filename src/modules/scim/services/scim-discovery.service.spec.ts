import { Test, TestingModule } from '@nestjs/testing';

import { ScimLogger } from '../../logging/scim-logger.service';
import {
  SCIM_LIST_RESPONSE_SCHEMA,
  SCIM_SP_CONFIG_SCHEMA,
} from '../common/scim-constants';
import { ScimSchemaRegistry } from '../schemas/scim-schema-registry';
import { SCIM_SCHEMA_REGISTRY } from '../scim-module.tokens';
import { ScimDiscoveryService } from './scim-discovery.service';

describe('ScimDiscoveryService', () => {
  let service: ScimDiscoveryService;
  let mockLogger: { debug: jest.Mock };

  beforeEach(async () => {
    mockLogger = { debug: jest.fn() };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ScimDiscoveryService,
        { provide: SCIM_SCHEMA_REGISTRY, useValue: new ScimSchemaRegistry({ enterpriseUserRequired: true }) },
        { provide: ScimLogger, useValue: mockLogger },
      ],
    }).compile();
    service = module.get<ScimDiscoveryService>(ScimDiscoveryService);
  });

  it('should list every schema', () => {
    const list = service.getSchemas();
    expect(list.totalResults).toBe(5);
    expect(list.Resources.map((schema) => schema.name)).toEqual([
      'User',
      'Group',
      'ResourceType',
      'Service Provider Configuration',
      'EnterpriseUser',
    ]);
    expect(mockLogger.debug).toHaveBeenCalledWith('scim.schema', 'Schemas listed', { totalResults: 5 });
  });

  it('should list the resource types with the registry bindings', () => {
    const list = service.getResourceTypes();
    expect(list.schemas).toEqual([SCIM_LIST_RESPONSE_SCHEMA]);
    expect(list.totalResults).toBe(2);
    expect(list.startIndex).toBe(1);
    expect(list.itemsPerPage).toBe(2);
    expect(list.Resources[0]?.schemaExtensions).toEqual([
      { schema: 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User', required: true },
    ]);
    expect(mockLogger.debug).toHaveBeenCalledWith('scim.schema', 'Resource types listed', { names: ['User', 'Group'] });
  });

  it('should build the ServiceProviderConfig', () => {
    const config = service.getServiceProviderConfig({ etag: { supported: true } });
    expect(config.schemas).toEqual([SCIM_SP_CONFIG_SCHEMA]);
    expect(config.etag).toEqual({ supported: true });
    expect(config.sort).toEqual({ supported: false });
  });
});
