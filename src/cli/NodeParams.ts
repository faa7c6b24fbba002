import { promises as dns } from 'dns';
import { InvalidArgumentError } from '../common/errors';
import { MembershipSettings } from '../config/MembershipConfiguration';
import { LocalIdentity, Pnn } from '../types';

export const AFTER_LAST_DASH = 'after-last-dash';

export type NodeCliOptions = {
  hostname?: string;
  nodeNumber?: number;
  takeNodeNumberFromHostname?: string;
  persistentPath?: string;
  metadataSource?: string;
  ip?: string;
};

export type AddressLookup = (hostname: string) => Promise<string[]>;

const LOOPBACK_ADDRESSES = ['127.0.0.1', '::1'];

/**
 * IPv4 and IPv6 addresses of a host name, via the system resolver
 */
export const lookupHostAddresses: AddressLookup = async hostname => {
  const results = await dns.lookup(hostname, { all: true });
  return results.map(result => result.address);
};

/**
 * Node parameters shared by the membership commands, resolved from the
 * command line with the configuration file as fallback.
 */
export class NodeParams {
  readonly nodeNumber?: Pnn;
  readonly hostname?: string;
  readonly persistentPath: string;
  readonly canonicalPath: string;
  readonly metadataSource: string;
  private address?: string;

  constructor(
    private readonly cli: NodeCliOptions,
    settings: MembershipSettings,
    private readonly lookup: AddressLookup = lookupHostAddresses
  ) {
    this.hostname = cli.hostname;
    this.persistentPath = cli.persistentPath ?? settings.nodesPath;
    this.canonicalPath = settings.canonicalNodesPath;
    this.metadataSource = cli.metadataSource ?? settings.metadataSource;
    this.nodeNumber = NodeParams.resolveNodeNumber(cli);
  }

  private static resolveNodeNumber(cli: NodeCliOptions): Pnn | undefined {
    if (cli.nodeNumber !== undefined) {
      if (!Number.isInteger(cli.nodeNumber) || cli.nodeNumber < 0) {
        throw new InvalidArgumentError(`invalid node number: ${cli.nodeNumber}`);
      }
      return cli.nodeNumber;
    }

    if (cli.takeNodeNumberFromHostname === undefined) {
      return undefined;
    }
    if (cli.takeNodeNumberFromHostname !== AFTER_LAST_DASH) {
      throw new InvalidArgumentError(`unknown node number policy: ${cli.takeNodeNumberFromHostname}`);
    }
    if (!cli.hostname) {
      throw new InvalidArgumentError('--hostname required if taking node number from host name');
    }
    const dash = cli.hostname.lastIndexOf('-');
    const suffix = dash >= 0 ? cli.hostname.slice(dash + 1) : '';
    if (!/^\d+$/.test(suffix)) {
      throw new InvalidArgumentError(`invalid hostname for node number: ${cli.hostname}`);
    }
    return Number(suffix);
  }

  /**
   * Pnn to act as; nodes without an explicit number act as pnn 0
   */
  get pnn(): Pnn {
    return this.nodeNumber ?? 0;
  }

  get identity(): string {
    if (this.hostname) {
      return this.hostname;
    }
    if (this.nodeNumber !== undefined) {
      return `node-${this.nodeNumber}`;
    }
    // the dashes make this an invalid dns name
    return '-unknown-';
  }

  async nodeAddress(): Promise<string> {
    if (this.address === undefined) {
      this.address = await this.resolveAddress();
    }
    return this.address;
  }

  async localIdentity(): Promise<LocalIdentity> {
    return { identity: this.identity, node: await this.nodeAddress(), pnn: this.pnn };
  }

  private async resolveAddress(): Promise<string> {
    if (this.cli.ip) {
      return this.cli.ip;
    }
    if (!this.cli.hostname) {
      throw new InvalidArgumentError('can not determine node ip');
    }
    const candidates = (await this.lookup(this.cli.hostname)).filter(address => !LOOPBACK_ADDRESSES.includes(address));
    const [address] = candidates;
    if (address === undefined) {
      throw new InvalidArgumentError(`no usable address found for ${this.cli.hostname}`);
    }
    return address;
  }
}
