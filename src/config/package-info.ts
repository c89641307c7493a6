/**
 * Name and version of this package, read from package.json
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const packageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof packageInfoSchema>;

export function loadPackageInfo(): PackageInfo {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return packageInfoSchema.parse(JSON.parse(raw));
}
