import { zodToJsonSchema } from 'zod-to-json-schema';

import { LoadTestConfigSchema } from './config';

/**
 * JSON Schema of the configuration file, for editor completion and
 * validation of `load-pacer.config.json`.
 */
export function buildConfigJsonSchema(): ReturnType<typeof zodToJsonSchema> {
  return zodToJsonSchema(LoadTestConfigSchema, 'LoadTestConfig');
}
