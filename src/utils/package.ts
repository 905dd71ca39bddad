import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Same relative location from src/utils and dist/utils
const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

/**
 * Version of the installed hdrpack package
 */
export function getVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(fileURLToPath(PACKAGE_JSON_URL), 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}
