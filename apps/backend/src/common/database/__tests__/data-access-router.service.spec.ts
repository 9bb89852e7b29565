import { Test, TestingModule } from '@nestjs/testing';
import {
  InMemoryConnectionSource,
  emptyTables,
} from '../../../../test/support/in-memory-connection-source';
import { CONNECTION_SOURCE } from '../connection-source';
import { DataAccessRouter } from '../data-access-router.service';

describe('DataAccessRouter', () => {
  let router: DataAccessRouter;
  let source: InMemoryConnectionSource;

  beforeEach(async () => {
    source = new InMemoryConnectionSource(emptyTables());

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DataAccessRouter,
        { provide: CONNECTION_SOURCE, useValue: source },
      ],
    }).compile();

    router = module.get<DataAccessRouter>(DataAccessRouter);
  });

  it.each([
    ['read', 'replica'],
    ['write', 'primary'],
    [undefined, 'primary'],
  ] as const)('routes %s intent to the %s', async (intent, target) => {
    await router.run(intent, async () => undefined);

    expect(source.acquired).toEqual([target]);
    expect(source.released).toBe(1);
  });

  it('does not carry intent over to the next call', async () => {
    await router.read(async () => undefined);
    await router.run(undefined, async () => undefined);

    expect(source.acquired).toEqual(['replica', 'primary']);
  });

  it('sends reads that need fresh data to the primary', async () => {
    await router.readFromPrimary(async () => undefined);
    await router.read(async () => undefined);

    expect(source.acquired).toEqual(['primary', 'replica']);
    expect(source.released).toBe(2);
  });

  it('releases the connection when the work fails', async () => {
    await expect(
      router.read(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(source.released).toBe(1);
  });

  it('commits a transaction on the primary', async () => {
    await expect(router.transaction(async () => 'done')).resolves.toBe('done');

    expect(source.acquired).toEqual(['primary']);
    expect(source.statements).toEqual(['BEGIN', 'COMMIT']);
    expect(source.released).toBe(1);
  });

  it('rolls back a failed transaction', async () => {
    await expect(
      router.transaction(async () => {
        throw new Error('constraint violated');
      }),
    ).rejects.toThrow('constraint violated');

    expect(source.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(source.released).toBe(1);
  });
});
