import { describe, it, expect } from 'vitest';
import { buildTestApp, readJson } from '../helpers/build-test-app';
import { buildTestConfig } from '../helpers/test-config';

describe('first-superuser seed on start', () => {
  it('creates the superuser when enabled outside production', async () => {
    const t = await buildTestApp({ config: buildTestConfig({ seed: { enabled: true, superuserEmail: 'admin@example.com', superuserPassword: 'Seed-Passw0rd' } }) });

    try {
      const stored = await t.credentialStore.findByEmail('admin@example.com');
      expect(stored).toMatchObject({ isSuperuser: true, isActive: true });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'admin@example.com', password: 'Seed-Passw0rd' },
      });
      expect(res.statusCode).toBe(200);
      expect(readJson<{ tokenType: string }>(res).tokenType).toBe('bearer');
    } finally {
      await t.close();
    }
  });

  it('does not seed when disabled', async () => {
    const t = await buildTestApp();

    try {
      await expect(t.credentialStore.findByEmail('admin@example.com')).resolves.toBeUndefined();
    } finally {
      await t.close();
    }
  });

  it('never seeds in production', async () => {
    const t = await buildTestApp({
      config: buildTestConfig({
        nodeEnv: 'production',
        seed: { enabled: true, superuserEmail: 'admin@example.com', superuserPassword: 'Seed-Passw0rd' },
      }),
    });

    try {
      await expect(t.credentialStore.findByEmail('admin@example.com')).resolves.toBeUndefined();
    } finally {
      await t.close();
    }
  });
});
