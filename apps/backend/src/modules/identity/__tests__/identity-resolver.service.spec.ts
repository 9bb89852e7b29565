import { Test, TestingModule } from '@nestjs/testing';
import { IdentityResolverService } from '../identity-resolver.service';
import { LegacyUserRepository } from '../legacy-user.repository';
import { UserRepository } from '../user.repository';
import { CredentialStore } from '../principal';
import { DataAccessRouter } from '../../../common/database/data-access-router.service';
import { CONNECTION_SOURCE } from '../../../common/database/connection-source';
import {
  InMemoryConnectionSource,
  emptyTables,
} from '../../../../test/support/in-memory-connection-source';

describe('IdentityResolverService', () => {
  let resolver: IdentityResolverService;
  let source: InMemoryConnectionSource;

  beforeEach(async () => {
    source = new InMemoryConnectionSource(emptyTables());

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IdentityResolverService,
        UserRepository,
        LegacyUserRepository,
        DataAccessRouter,
        { provide: CONNECTION_SOURCE, useValue: source },
      ],
    }).compile();

    resolver = module.get<IdentityResolverService>(IdentityResolverService);
  });

  it('resolves a legacy-only user from the legacy store', async () => {
    source.tables.secUsers.push({
      id: 'legacy-1',
      login: 'alice',
      password: 'aGFzaA==:c2FsdA==:1000',
      active: true,
      deleted: false,
    });

    await expect(resolver.resolve('alice')).resolves.toEqual({
      id: 'legacy-1',
      username: 'alice',
      passwordHash: 'aGFzaA==:c2FsdA==:1000',
      enabled: true,
      sourceStore: CredentialStore.LEGACY,
    });
  });

  it('prefers the modern store when both hold the user', async () => {
    source.tables.users.push({
      id: 'modern-1',
      username: 'bob',
      password_hash: '$2a$04$modernhash',
      enabled: true,
      deleted: false,
    });
    source.tables.secUsers.push({
      id: 'legacy-2',
      login: 'bob',
      password: 'aGFzaA==:c2FsdA==:1000',
      active: true,
      deleted: false,
    });

    const principal = await resolver.resolve('bob');

    expect(principal?.id).toBe('modern-1');
    expect(principal?.sourceStore).toBe(CredentialStore.MODERN);
    // one store answered, the legacy store was never asked
    expect(source.statements.some((sql) => sql.includes('sec_user'))).toBe(false);
  });

  it('returns null when neither store knows the user', async () => {
    await expect(resolver.resolve('nobody')).resolves.toBeNull();
  });

  it('does not find soft-deleted rows', async () => {
    source.tables.users.push({
      id: 'modern-2',
      username: 'carol',
      password_hash: '$2a$04$x',
      enabled: true,
      deleted: true,
    });

    await expect(resolver.resolve('carol')).resolves.toBeNull();
  });

  it('returns disabled accounts as they are', async () => {
    source.tables.secUsers.push({
      id: 'legacy-3',
      login: 'dave',
      password: 'aGFzaA==:c2FsdA==:1000',
      active: false,
      deleted: false,
    });

    await expect(resolver.resolve('dave')).resolves.toMatchObject({ enabled: false });
  });

  it('resolves blank usernames to null without a lookup', async () => {
    await expect(resolver.resolve('   ')).resolves.toBeNull();
    expect(source.acquired).toEqual([]);
  });

  it('reads with read intent', async () => {
    await resolver.resolve('nobody');

    expect(source.acquired).toEqual(['replica', 'replica']);
  });
});
