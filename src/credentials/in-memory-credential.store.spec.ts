import { toDecimal } from '../common/utils/decimal.util';
import { InMemoryCredentialStore } from './in-memory-credential.store';

describe('InMemoryCredentialStore', () => {
  let store: InMemoryCredentialStore;
  const ctx = { sessionId: 'session-1' };
  const credential = (apiName: string) => ({ apiName, apiKey: `key-${apiName}`, apiSecret: 'test-secret' });

  beforeEach(() => {
    store = new InMemoryCredentialStore();
  });

  it('should list credentials in the order they were added', async () => {
    await store.save(ctx, credential('b'), toDecimal(1));
    await store.save(ctx, credential('a'), toDecimal(2));

    const records = await store.list(ctx);

    expect(records.map((record) => record.apiName)).toEqual(['b', 'a']);
  });

  it('should keep the original creation time when replacing', async () => {
    const first = await store.save(ctx, credential('main'), toDecimal(100));
    const second = await store.save(ctx, { ...credential('main'), apiKey: 'key-rotated' }, toDecimal(200));

    expect(second.createdAt).toBe(first.createdAt);
    expect(second.apiKey).toBe('key-rotated');
    await expect(store.get(ctx, 'main')).resolves.toBe(second);
  });

  it('should scope every operation to the session', async () => {
    await store.save(ctx, credential('main'), toDecimal(100));
    const other = { sessionId: 'session-2' };

    await expect(store.list(other)).resolves.toEqual([]);
    await expect(store.remove(other, 'main')).resolves.toBe(false);
    await store.clear(other);

    await expect(store.list(ctx)).resolves.toHaveLength(1);
  });

  it('should remove and clear', async () => {
    await store.save(ctx, credential('a'), toDecimal(1));
    await store.save(ctx, credential('b'), toDecimal(1));

    await expect(store.remove(ctx, 'a')).resolves.toBe(true);
    await store.clear(ctx);

    await expect(store.list(ctx)).resolves.toEqual([]);
  });
});
