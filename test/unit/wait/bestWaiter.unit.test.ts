import { FileChangeWaiter } from '../../../src/wait/FileChangeWaiter';
import { Sleeper } from '../../../src/wait/Sleeper';
import { bestWaiter } from '../../../src/wait/bestWaiter';

describe('bestWaiter', () => {
  it('should watch file-backed metadata', () => {
    const waiter = bestWaiter('/var/lib/ctdb/shared/nodes.json');
    expect(waiter).toBeInstanceOf(FileChangeWaiter);
    expect(waiter instanceof FileChangeWaiter && waiter.filePath).toBe('/var/lib/ctdb/shared/nodes.json');
  });

  it('should sleep when asked to or when the metadata is not a file', () => {
    expect(bestWaiter('/var/lib/ctdb/shared/nodes.json', { strategy: 'sleep' })).toBeInstanceOf(Sleeper);
    expect(bestWaiter('s3://test-bucket/nodes.json')).toBeInstanceOf(Sleeper);
    expect(bestWaiter('memory:', { strategy: 'watch' })).toBeInstanceOf(Sleeper);
  });
});
