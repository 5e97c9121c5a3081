/* eslint-disable no-console */
import fs from 'fs';
import path from 'path';

import pkg from '../package.json';
import { buildConfigJsonSchema } from '../src/schema';

const schemaString = JSON.stringify(buildConfigJsonSchema(), null, 2);

const schemasDir = path.resolve(process.cwd(), 'schemas');
fs.mkdirSync(schemasDir, { recursive: true });

const versionedSchemaPath = path.resolve(
  schemasDir,
  `load-pacer.schema.v${pkg.version}.json`,
);
fs.writeFileSync(versionedSchemaPath, schemaString);
console.log(`JSON schema generated at ${versionedSchemaPath}`);
