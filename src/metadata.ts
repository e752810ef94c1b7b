/**
 * Project metadata read from the root package.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const packageSchema = z.object({
  name: z.string(),
  version: z.string(),
});

const pkg = packageSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
);

export const PROJECT_NAME: string = pkg.name;
export const PROJECT_VERSION: string = pkg.version;
