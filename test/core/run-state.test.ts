import { existsSync, readdirSync, writeFileSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PlanArtifactStore } from '../../src/core/deployment/plan-artifact.js';
import { RunLock } from '../../src/core/deployment/run-lock.js';
import { PlanArtifactError, RunLockError } from '../../src/core/errors.js';
import type { DeploymentPlan } from '../../src/core/types/deployment.js';
import { tempDir } from '../utils/fakes.js';

const plan: DeploymentPlan = {
  environment: 'dev',
  stage: 'infra',
  createdAt: '2026-01-15T10:00:00.000Z',
  actions: [
    { id: 'network', stage: 'infra', kind: 'network', name: 'dev-n8n-cluster-n8n-vpc', action: 'create', dependsOn: [] },
    {
      id: 'subnet',
      stage: 'infra',
      kind: 'subnetwork',
      name: 'dev-n8n-cluster-n8n-subnet',
      action: 'none',
      dependsOn: ['network'],
    },
  ],
};

describe('run state on disk', () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  describe('PlanArtifactStore', () => {
    it('should read back the plan it wrote', async () => {
      const store = new PlanArtifactStore(join(dir.path, 'plans'));
      const path = await store.write(plan, 'run-1');

      expect(path).toBe(join(dir.path, 'plans', 'dev-infra-run-1.plan.yaml'));
      expect(await store.read(path)).toEqual(plan);
    });

    it('should remove the artifact on dispose', async () => {
      const store = new PlanArtifactStore(dir.path);
      const path = await store.write(plan, 'run-1');

      await store.dispose(path);

      expect(existsSync(path)).toBe(false);
    });

    it('should reject a malformed artifact', async () => {
      const store = new PlanArtifactStore(dir.path);
      const path = join(dir.path, 'broken.plan.yaml');
      await writeFile(path, 'environment: dev\nstage: database\n', 'utf8');

      await expect(store.read(path)).rejects.toThrow(PlanArtifactError);
    });

    it('should reject a missing artifact', async () => {
      const store = new PlanArtifactStore(dir.path);
      await expect(store.read(join(dir.path, 'missing.plan.yaml'))).rejects.toThrow('Cannot read plan artifact');
    });
  });

  describe('RunLock', () => {
    it('should write the owner pid and release the lock', async () => {
      const lock = new RunLock(dir.path, 'dev', 4242);
      await lock.acquire();

      expect(await readFile(join(dir.path, 'dev.lock'), 'utf8')).toBe('4242');

      await lock.release();
      expect(existsSync(join(dir.path, 'dev.lock'))).toBe(false);
    });

    it('should refuse a second run while the owner is alive', async () => {
      const first = new RunLock(dir.path, 'dev', 4242, () => true);
      await first.acquire();

      const second = new RunLock(dir.path, 'dev', 5151, () => true);
      const attempt = second.acquire();

      await expect(attempt).rejects.toThrow(RunLockError);
      await expect(attempt).rejects.toThrow('Another run (pid 4242) holds the lock');
      await first.release();
    });

    it('should reclaim a lock whose owner is gone', async () => {
      await writeFile(join(dir.path, 'dev.lock'), '4242', 'utf8');

      const lock = new RunLock(dir.path, 'dev', 5151, () => false);
      await lock.acquire();

      expect(await readFile(join(dir.path, 'dev.lock'), 'utf8')).toBe('5151');
      await lock.release();
    });

    it('should leave nothing behind after reclaiming', async () => {
      await writeFile(join(dir.path, 'dev.lock'), '4242', 'utf8');

      const lock = new RunLock(dir.path, 'dev', 5151, () => false);
      await lock.acquire();

      expect(readdirSync(dir.path)).toEqual(['dev.lock']);
      await lock.release();
    });

    it('should put back a lock another run took while reclaiming', async () => {
      const path = join(dir.path, 'dev.lock');
      await writeFile(path, '1111', 'utf8');
      const isAlive = (pid: number): boolean => {
        if (pid === 1111) {
          writeFileSync(path, '4242', 'utf8');
          return false;
        }
        return pid === 4242;
      };

      const attempt = new RunLock(dir.path, 'dev', 5151, isAlive).acquire();

      await expect(attempt).rejects.toMatchObject({ ownerPid: 4242 });
      expect(await readFile(path, 'utf8')).toBe('4242');
      expect(readdirSync(dir.path)).toEqual(['dev.lock']);
    });

    it('should lock environments independently', async () => {
      const dev = new RunLock(dir.path, 'dev', 4242, () => true);
      const prod = new RunLock(dir.path, 'prod', 5151, () => true);

      await dev.acquire();
      await expect(prod.acquire()).resolves.toBeUndefined();

      await dev.release();
      await prod.release();
    });

    it('should leave a lock it does not hold alone', async () => {
      await writeFile(join(dir.path, 'dev.lock'), '4242', 'utf8');

      await new RunLock(dir.path, 'dev', 5151).release();

      expect(existsSync(join(dir.path, 'dev.lock'))).toBe(true);
    });
  });
});
