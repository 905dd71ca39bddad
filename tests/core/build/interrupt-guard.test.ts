import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { spawn } from 'node:child_process';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { withDeferredInterrupts } from '../../../src/core/build/interrupt-guard.js';
import { SAMPLE_DESCRIPTOR, makeTempDir, removeTempDir, writeFooLibrary } from '../../test-helpers.js';

const INTERRUPTED_CONFIGURE = fileURLToPath(new URL('../../fixtures/interrupted-configure.ts', import.meta.url));

interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  output: string;
}

function interruptDuringConfigure(sourceFolder: string, signal: NodeJS.Signals): Promise<ChildExit> {
  const child = spawn(process.execPath, ['--import', 'tsx', INTERRUPTED_CONFIGURE, sourceFolder], {
    stdio: ['ignore', 'pipe', 'pipe']
  });
  let output = '';
  let sent = false;

  return new Promise((resolve, reject) => {
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      output += chunk;
      if (!sent && output.includes('CONFIGURING\n')) {
        sent = true;
        child.kill(signal);
      }
    });
    child.stderr.on('data', (chunk: string) => {
      output += chunk;
    });
    child.on('error', reject);
    child.on('close', (code, exitSignal) => resolve({ code, signal: exitSignal, output }));
  });
}

describe('withDeferredInterrupts', () => {
  it('passes the value through and removes its listeners', async () => {
    const before = process.listenerCount('SIGINT');
    const beforeTerm = process.listenerCount('SIGTERM');
    const value = await withDeferredInterrupts(async signal => {
      assert.equal(process.listenerCount('SIGINT'), before + 1);
      assert.equal(process.listenerCount('SIGTERM'), beforeTerm + 1);
      assert.equal(signal.aborted, false);
      return 'configured';
    });
    assert.equal(value, 'configured');
    assert.equal(process.listenerCount('SIGINT'), before);
    assert.equal(process.listenerCount('SIGTERM'), beforeTerm);
  });

  it('rethrows a body failure and removes its listeners', async () => {
    const before = process.listenerCount('SIGTERM');
    await assert.rejects(
      withDeferredInterrupts(async () => {
        throw new Error('configure exploded');
      }),
      { message: 'configure exploded' }
    );
    assert.equal(process.listenerCount('SIGTERM'), before);
  });
});

describe('orchestrateConfigure under a signal', () => {
  let sourceFolder: string;

  beforeEach(async () => {
    sourceFolder = await makeTempDir('interrupt');
    await writeFooLibrary(sourceFolder);
  });

  afterEach(async () => {
    await removeTempDir(sourceFolder);
  });

  for (const [signal, exitCode] of [
    ['SIGINT', 130],
    ['SIGTERM', 143]
  ] as const) {
    it(`restores the descriptor and lock before exiting on ${signal}`, { timeout: 30_000 }, async () => {
      const exit = await interruptDuringConfigure(sourceFolder, signal);

      assert.equal(exit.code, exitCode, exit.output);
      assert.equal(exit.output.includes('FINISHED'), false);
      assert.equal(await readFile(path.join(sourceFolder, 'CMakeLists.txt'), 'utf8'), SAMPLE_DESCRIPTOR);
      const entries = await readdir(sourceFolder);
      assert.equal(entries.includes('CMakeLists.txt.hdrpack-backup'), false);
      assert.equal(entries.includes('CMakeLists.minimal.txt'), false);
      assert.equal(entries.includes('.hdrpack.lock'), false);
    });
  }
});
