import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigSchema } from '../config';
import { createServices } from '../services';
import type { AppServices } from '../services';
import { silentLogger } from '../utils/logger';
import { firstRandom } from '../utils/__tests__/helpers';

/** Services over a fresh temp directory with a predictable generator. */
export function makeTestServices(): { services: AppServices; dir: string } {
  const dir = mkdtempSync(join(tmpdir(), 'passkit-test-'));
  const config = ConfigSchema.parse({
    historyFile: join(dir, 'history.json'),
    logFile: join(dir, 'passkit.log'),
  });
  return { services: createServices(config, silentLogger, firstRandom), dir };
}
