/**
 * NestJS injection tokens provided by ScimModule.forRoot().
 *
 * Usage:
 *   @Inject(SCIM_SCHEMA_REGISTRY) private readonly registry: ScimSchemaRegistry
 */
export const SCIM_ENGINE_CONFIG = 'SCIM_ENGINE_CONFIG';
export const SCIM_SCHEMA_REGISTRY = 'SCIM_SCHEMA_REGISTRY';
