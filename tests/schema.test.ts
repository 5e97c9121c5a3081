import { describe, expect, it } from 'vitest';

import { buildConfigJsonSchema } from '../src/schema';

describe('buildConfigJsonSchema', () => {
  const schema = buildConfigJsonSchema();

  it('should describe the configuration under a named definition', () => {
    expect(schema).toMatchObject({
      $ref: '#/definitions/LoadTestConfig',
      definitions: {
        LoadTestConfig: {
          type: 'object',
          required: ['url', 'qps'],
        },
      },
    });
  });

  it('should list every configuration field', () => {
    expect(schema).toMatchObject({
      definitions: {
        LoadTestConfig: {
          properties: {
            url: { type: 'string', format: 'uri' },
            qps: { type: 'number', exclusiveMinimum: 0 },
            concurrency: { type: 'integer', default: 1 },
            expectedStatus: { type: 'integer', default: 200 },
          },
        },
      },
    });
  });
});
