import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  // package.json sits one level above both src/ and dist/
  try {
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export const VERSION = getVersion();
