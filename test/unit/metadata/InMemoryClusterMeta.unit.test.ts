import { NotFoundError } from '../../../src/common/errors';
import { InMemoryClusterMeta } from '../../../src/metadata/InMemoryClusterMeta';

describe('InMemoryClusterMeta', () => {
  it('should start without content', async () => {
    const store = new InMemoryClusterMeta();
    expect(store.snapshot()).toBeUndefined();
    await expect(store.load({ mustExist: true })).rejects.toThrow(NotFoundError);
  });

  it('should hand out copies so loaded documents do not alias the store', async () => {
    const store = new InMemoryClusterMeta('memory:test', { nodes: [{ node: '10.0.0.10', pnn: 0, in_nodes: true }] });
    const loaded = await store.load();
    loaded.nodes[0].in_nodes = false;

    await expect(store.load()).resolves.toEqual({ nodes: [{ node: '10.0.0.10', pnn: 0, in_nodes: true }] });
  });

  it('should run critical sections one at a time', async () => {
    const store = new InMemoryClusterMeta();
    const register = (node: string) => store.withLock(async session => {
      const pnn = session.document.nodes.length;
      await new Promise(resolve => setTimeout(resolve, 5));
      session.document.nodes.push({ node, pnn, in_nodes: false });
      session.markChanged();
      return pnn;
    });

    const pnns = await Promise.all([register('10.0.0.10'), register('10.0.0.11'), register('10.0.0.12')]);

    expect(pnns).toEqual([0, 1, 2]);
    expect((await store.load()).nodes.map(entry => entry.node)).toEqual(['10.0.0.10', '10.0.0.11', '10.0.0.12']);
  });

  it('should stop waiting for the lock when aborted without letting others past the holder', async () => {
    const store = new InMemoryClusterMeta();
    const order: string[] = [];
    let releaseHolder = () => {};
    const holderGate = new Promise<void>(resolve => {
      releaseHolder = resolve;
    });

    const holder = store.withLock(async () => {
      await holderGate;
      order.push('holder done');
    });
    const controller = new AbortController();
    const cancelled = store.withLock(async () => {
      order.push('cancelled ran');
    }, { signal: controller.signal });
    const next = store.withLock(async () => {
      order.push('next ran');
    });

    controller.abort(new Error('no longer needed'));
    await expect(cancelled).rejects.toThrow('no longer needed');

    releaseHolder();
    await Promise.all([holder, next]);
    expect(order).toEqual(['holder done', 'next ran']);
  });

  it('should discard changes from a failed section and keep serving the lock', async () => {
    const store = new InMemoryClusterMeta();
    await expect(store.withLock(async session => {
      session.document.nodes.push({ node: '10.0.0.10', pnn: 0, in_nodes: true });
      session.markChanged();
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(store.snapshot()).toBeUndefined();
    await expect(store.withLock(async () => 'next')).resolves.toBe('next');
  });
});
