import { describe, it, expect, vi } from 'vitest';
import { runFirstSuperuserSeed } from '../../../../src/shared/db/seed/first-superuser-seed';
import { AppError } from '../../../../src/shared/http/errors';
import { logger } from '../../../../src/shared/logger/logger';

const options = { email: 'admin@example.com', password: 'Seed-Passw0rd' };

describe('runFirstSuperuserSeed', () => {
  it('creates the superuser through createCredential when missing', async () => {
    const createCredential = vi.fn().mockResolvedValue({ id: 'id-1' });

    const result = await runFirstSuperuserSeed({
      findByEmail: () => Promise.resolve(undefined),
      createCredential,
      logger,
      options,
    });

    expect(result).toBe('created');
    expect(createCredential).toHaveBeenCalledWith({
      email: 'admin@example.com',
      password: 'Seed-Passw0rd',
      isSuperuser: true,
      requestId: 'seed.superuser',
    });
  });

  it('leaves an existing credential alone', async () => {
    const createCredential = vi.fn();

    const result = await runFirstSuperuserSeed({
      findByEmail: () => Promise.resolve({ id: 'id-1' }),
      createCredential,
      logger,
      options,
    });

    expect(result).toBe('exists');
    expect(createCredential).not.toHaveBeenCalled();
  });

  it('treats losing the insert race as already seeded', async () => {
    const result = await runFirstSuperuserSeed({
      findByEmail: () => Promise.resolve(undefined),
      createCredential: () => Promise.reject(AppError.conflict('taken')),
      logger,
      options,
    });

    expect(result).toBe('exists');
  });

  it('propagates every other failure', async () => {
    await expect(
      runFirstSuperuserSeed({
        findByEmail: () => Promise.resolve(undefined),
        createCredential: () => Promise.reject(AppError.weakPassword('too weak')),
        logger,
        options,
      }),
    ).rejects.toMatchObject({ code: 'WEAK_PASSWORD' });
  });
});
