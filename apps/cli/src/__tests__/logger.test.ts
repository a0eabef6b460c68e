// apps/cli/src/__tests__/logger.test.ts

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  it('writes JSON lines to LOG_FILE at the configured level', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hangman-log-'));
    const logFile = join(dir, 'hangman.log');
    try {
      const log = createLogger({ logLevel: 'info', logFile });
      log.debug('hidden');
      log.info({ round: 'round-1' }, 'round started');

      const lines = (await readFile(logFile, 'utf8')).trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 30,
        round: 'round-1',
        msg: 'round started',
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
