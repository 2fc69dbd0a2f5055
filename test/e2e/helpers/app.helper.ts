import { Test, type TestingModule } from '@nestjs/testing';

import { ScimModule } from '../../../src/modules/scim/scim.module';
import type { ScimEngineConfig } from '../../../src/modules/scim/config/scim-engine-config.interface';
import { ScimLogger, type StructuredLogEntry } from '../../../src/modules/logging/scim-logger.service';

export interface TestEngine {
  app: TestingModule;
  /** Entries emitted through ScimLogger after the engine was created. */
  logs: StructuredLogEntry[];
}

/**
 * Bootstraps the engine as an application would: ScimModule.forRoot() with the
 * given flags, resolved inside a NestJS application context. Log output is
 * captured instead of written to the console.
 *
 * Call `app.close()` in your `afterAll()` to shut down cleanly.
 */
export async function createTestEngine(config: ScimEngineConfig = { unknownAttributes: 'reject' }): Promise<TestEngine> {
  process.env.NODE_ENV = 'test';
  process.env.LOG_LEVEL = 'WARN';

  const app = await Test.createTestingModule({
    imports: [ScimModule.forRoot(config)],
  }).compile();

  const logs: StructuredLogEntry[] = [];
  const logger = app.get(ScimLogger);
  logger.setGlobalLevel('TRACE');
  logger.setSink((_level, entry) => {
    logs.push(entry);
  });
  await app.init();
  return { app, logs };
}
