import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const packagePath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const result = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, 'utf8')));
    return result.success ? result.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export const VERSION = readVersion();
