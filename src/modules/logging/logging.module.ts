import { Global, Module } from '@nestjs/common';

import { ScimLogger } from './scim-logger.service';

@Global()
@Module({
  providers: [ScimLogger],
  exports: [ScimLogger]
})
export class LoggingModule {}
