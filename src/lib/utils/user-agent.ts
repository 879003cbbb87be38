import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

export interface PackageInfo {
  name: string;
  version: string;
}

const packageJsonSchema = z.object({
  name: z.string(),
  version: z.string().min(1),
});

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata.
 * Tries several relative paths because this file runs both from src/ and dist/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'acme-register', version: '0.0.0-dev' };

  const candidates = [
    '../../../package.json', // from src/lib/utils/
    '../../package.json', // from dist/lib/utils/
  ];

  for (const rel of candidates) {
    const path = join(__dirname, rel);
    if (!existsSync(path)) continue;
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (parsed.success && parsed.data.name === defaults.name) {
      cachedPkg = parsed.data;
      return cachedPkg;
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build a standardized User-Agent string for outbound ACME HTTP calls */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
