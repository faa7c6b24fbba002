import { InvalidArgumentError } from '../../../src/common/errors';
import { MembershipConfiguration } from '../../../src/config/MembershipConfiguration';
import { AFTER_LAST_DASH, AddressLookup, NodeParams } from '../../../src/cli/NodeParams';

describe('NodeParams', () => {
  const settings = MembershipConfiguration.defaults();
  const lookup: AddressLookup = async () => ['127.0.0.1', '10.0.0.11', '10.0.0.12'];

  it('should fall back to the configured paths', () => {
    const params = new NodeParams({}, settings, lookup);

    expect(params.persistentPath).toBe(settings.nodesPath);
    expect(params.canonicalPath).toBe(settings.canonicalNodesPath);
    expect(params.metadataSource).toBe(settings.metadataSource);
    expect(params.pnn).toBe(0);
  });

  it('should prefer command line paths', () => {
    const params = new NodeParams({ persistentPath: '/data/nodes', metadataSource: 'memory:' }, settings, lookup);
    expect(params.persistentPath).toBe('/data/nodes');
    expect(params.metadataSource).toBe('memory:');
  });

  it('should take the node number from the host name after the last dash', () => {
    const params = new NodeParams(
      { hostname: 'fileserver-east-3', takeNodeNumberFromHostname: AFTER_LAST_DASH },
      settings,
      lookup
    );
    expect(params.nodeNumber).toBe(3);
    expect(params.identity).toBe('fileserver-east-3');
  });

  it('should reject host names that do not end in a number', () => {
    expect(() => new NodeParams({ hostname: 'fileserver', takeNodeNumberFromHostname: AFTER_LAST_DASH }, settings, lookup))
      .toThrow('invalid hostname for node number: fileserver');
    expect(() => new NodeParams({ takeNodeNumberFromHostname: AFTER_LAST_DASH }, settings, lookup))
      .toThrow(InvalidArgumentError);
    expect(() => new NodeParams({ hostname: 'fs-1', takeNodeNumberFromHostname: 'first-dash' }, settings, lookup))
      .toThrow('unknown node number policy: first-dash');
  });

  it('should derive an identity without a host name', () => {
    expect(new NodeParams({ nodeNumber: 4 }, settings, lookup).identity).toBe('node-4');
    expect(new NodeParams({}, settings, lookup).identity).toBe('-unknown-');
  });

  it('should use the given address before looking the host up', async () => {
    const params = new NodeParams({ hostname: 'fs-1', ip: '10.0.0.50', nodeNumber: 1 }, settings, lookup);
    await expect(params.localIdentity()).resolves.toEqual({ identity: 'fs-1', node: '10.0.0.50', pnn: 1 });
  });

  it('should skip the loopback address and resolve only once', async () => {
    let lookups = 0;
    const counting: AddressLookup = async hostname => {
      lookups++;
      return lookup(hostname);
    };
    const params = new NodeParams({ hostname: 'fs-1' }, settings, counting);

    await expect(params.nodeAddress()).resolves.toBe('10.0.0.11');
    await expect(params.nodeAddress()).resolves.toBe('10.0.0.11');
    expect(lookups).toBe(1);
  });

  it('should skip the IPv6 loopback address', async () => {
    const dualStack: AddressLookup = async () => ['::1', '127.0.0.1', 'fd00::11'];
    await expect(new NodeParams({ hostname: 'fs-1' }, settings, dualStack).nodeAddress()).resolves.toBe('fd00::11');
  });

  it('should fail without a usable address', async () => {
    await expect(new NodeParams({}, settings, lookup).nodeAddress()).rejects.toThrow('can not determine node ip');
    const loopbackOnly: AddressLookup = async () => ['127.0.0.1'];
    await expect(new NodeParams({ hostname: 'fs-1' }, settings, loopbackOnly).nodeAddress())
      .rejects.toThrow('no usable address found for fs-1');
  });
});
