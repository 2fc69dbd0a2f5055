import { Inject, Injectable } from '@nestjs/common';
import type { z } from 'zod';

import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import {
  decodeResource,
  encodeResource,
  SCIM_GROUP_CODEC,
  SCIM_RESOURCE_TYPE_CODEC,
  SCIM_SERVICE_PROVIDER_CONFIG_CODEC,
  SCIM_USER_CODEC,
  type ScimDecodeOptions,
  type ScimDecoded,
  type ScimEncodeOptions,
  type ScimResourceCodec,
} from '../codec/scim-resource-codec';
import { jsonToListResponse, listResponseToJson } from '../codec/scim-json-codec';
import { jsonToSearchRequest, searchRequestToJson } from '../codec/scim-search-request-codec';
import type { ScimError, ScimResult } from '../common/scim-errors';
import type {
  ScimGroup,
  ScimListResponse,
  ScimResourceType,
  ScimSearchRequest,
  ScimServiceProviderConfig,
  ScimUser,
} from '../common/scim-types';
import { ENGINE_CONFIG_FLAGS, getConfigBoolean, type ScimEngineConfig } from '../config/scim-engine-config.interface';
import { ScimSchemaRegistry } from '../schemas/scim-schema-registry';
import { SCIM_ENGINE_CONFIG, SCIM_SCHEMA_REGISTRY } from '../scim-module.tokens';

/**
 * JSON codec bound to the module's configuration: the unknown-attribute
 * policy, pretty printing and the schema registry are fixed at module setup.
 */
@Injectable()
export class ScimCodecService {
  private readonly decodeOptions: ScimDecodeOptions;
  private readonly encodeOptions: ScimEncodeOptions;

  constructor(
    @Inject(SCIM_ENGINE_CONFIG) config: ScimEngineConfig,
    @Inject(SCIM_SCHEMA_REGISTRY) registry: ScimSchemaRegistry,
    private readonly logger: ScimLogger,
  ) {
    this.decodeOptions = { unknownAttributes: config.unknownAttributes, registry };
    this.encodeOptions = { pretty: getConfigBoolean(config, ENGINE_CONFIG_FLAGS.PRETTY_PRINT), registry };
  }

  decodeUser(text: string): ScimResult<ScimUser> {
    return this.decode(text, SCIM_USER_CODEC);
  }

  decodeGroup(text: string): ScimResult<ScimGroup> {
    return this.decode(text, SCIM_GROUP_CODEC);
  }

  decodeResourceType(text: string): ScimResult<ScimResourceType> {
    return this.decode(text, SCIM_RESOURCE_TYPE_CODEC);
  }

  decodeServiceProviderConfig(text: string): ScimResult<ScimServiceProviderConfig> {
    return this.decode(text, SCIM_SERVICE_PROVIDER_CONFIG_CODEC);
  }

  encodeUser(user: ScimUser): ScimResult<string> {
    return this.encode(user, SCIM_USER_CODEC);
  }

  encodeGroup(group: ScimGroup): ScimResult<string> {
    return this.encode(group, SCIM_GROUP_CODEC);
  }

  encodeResourceType(resourceType: ScimResourceType): ScimResult<string> {
    return this.encode(resourceType, SCIM_RESOURCE_TYPE_CODEC);
  }

  encodeServiceProviderConfig(config: ScimServiceProviderConfig): ScimResult<string> {
    return this.encode(config, SCIM_SERVICE_PROVIDER_CONFIG_CODEC);
  }

  decodeList<S extends z.AnyZodObject>(text: string, codec: ScimResourceCodec<S>): ScimResult<ScimListResponse<ScimDecoded<S>>> {
    this.tracePayload('Decoding ListResponse', codec.resourceType, text);
    const result = jsonToListResponse(text, codec, this.decodeOptions);
    if (!result.ok) {
      this.logFailure('ListResponse decode rejected', codec.resourceType, result.error);
    }
    return result;
  }

  encodeList<S extends z.AnyZodObject>(list: ScimListResponse<ScimDecoded<S>>, codec: ScimResourceCodec<S>): ScimResult<string> {
    const result = listResponseToJson(list, codec, this.encodeOptions);
    if (!result.ok) {
      this.logFailure('ListResponse encode failed', codec.resourceType, result.error);
    }
    return result;
  }

  decodeSearchRequest(text: string): ScimResult<ScimSearchRequest> {
    this.tracePayload('Decoding SearchRequest', 'SearchRequest', text);
    const result = jsonToSearchRequest(text, this.decodeOptions);
    if (!result.ok) {
      this.logFailure('SearchRequest decode rejected', 'SearchRequest', result.error);
    }
    return result;
  }

  encodeSearchRequest(request: ScimSearchRequest): ScimResult<string> {
    const result = searchRequestToJson(request, this.encodeOptions);
    if (!result.ok) {
      this.logFailure('SearchRequest encode failed', 'SearchRequest', result.error);
    }
    return result;
  }

  private decode<S extends z.AnyZodObject>(text: string, codec: ScimResourceCodec<S>): ScimResult<ScimDecoded<S>> {
    this.tracePayload('Decoding document', codec.resourceType, text);

    const result = decodeResource(text, codec, this.decodeOptions);
    if (!result.ok) {
      this.logFailure('Decode rejected', codec.resourceType, result.error);
      return result;
    }

    const preserved = result.value.additionalAttributes;
    if (preserved) {
      this.logger.warn(LogCategory.SCIM_CODEC, 'Preserved attributes not defined by any schema', {
        resourceType: codec.resourceType,
        attributes: Object.keys(preserved),
      });
    }
    return result;
  }

  private encode<S extends z.AnyZodObject>(resource: ScimDecoded<S>, codec: ScimResourceCodec<S>): ScimResult<string> {
    const result = encodeResource(resource, codec, this.encodeOptions);
    if (!result.ok) {
      this.logFailure('Encode failed', codec.resourceType, result.error);
      return result;
    }
    this.tracePayload('Encoded document', codec.resourceType, result.value);
    return result;
  }

  private tracePayload(message: string, resourceType: string, body: string): void {
    if (!this.logger.includePayloads) return;
    this.logger.trace(LogCategory.SCIM_CODEC, message, { resourceType, body });
  }

  private logFailure(message: string, resourceType: string, error: ScimError): void {
    this.logger.debug(LogCategory.SCIM_CODEC, message, {
      resourceType,
      kind: error.kind,
      rule: error.rule,
      path: error.path,
      detail: error.message,
    });
  }
}
