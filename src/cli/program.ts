import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { MembershipLogger, createLogger } from '../common/logger';
import { MembershipConfiguration, MembershipSettings } from '../config/MembershipConfiguration';
import { CommandRunner, ProcessCommandRunner } from '../control/CommandRunner';
import { CtdbController } from '../control/DaemonController';
import { DEFAULT_DATABASE_DIR, migrateLegacyDatabases } from '../control/LegacyMigration';
import { openClusterMeta } from '../metadata/ClusterMetaFactory';
import { NodesFile } from '../nodes/NodesFile';
import { NodesReconciler } from '../reconcile/NodesReconciler';
import { registerOrRefresh } from '../registration/NodeRegistration';
import { MembershipSupervisor, waitForAdmission } from '../supervisor/MembershipSupervisor';
import { bestWaiter } from '../wait/bestWaiter';
import { AFTER_LAST_DASH, AddressLookup, NodeCliOptions, NodeParams, lookupHostAddresses } from './NodeParams';

export interface CliDependencies {
  lookup?: AddressLookup;
  /** Builds the runner for daemon control commands */
  createRunner?: (settings: MembershipSettings, logger: MembershipLogger) => CommandRunner;
  signal?: AbortSignal;
  environment?: string;
}

type CommonOptions = {
  config?: string;
};

type MigrateOptions = CommonOptions & {
  destDir: string;
  nodeNumber?: number;
};

function parseNodeNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CommanderArgumentError('node number must be a non-negative integer');
  }
  return Number(value);
}

function addNodeOptions(command: Command): Command {
  return command
    .option('--hostname <name>', 'Host name of the node')
    .option('--node-number <n>', 'Expected node number', parseNodeNumber)
    .addOption(
      new Option('--take-node-number-from-hostname <policy>', 'Take the node number from the host name')
        .choices([AFTER_LAST_DASH])
    )
    .option('--persistent-path <path>', 'Persistent path for storing the nodes file')
    .option('--metadata-source <location>', 'Cluster metadata location: a file path or URI');
}

/**
 * Build the fleet-membership command line
 */
export function buildProgram(deps: CliDependencies = {}): Command {
  const lookup = deps.lookup ?? lookupHostAddresses;
  const createRunner = deps.createRunner
    ?? ((settings: MembershipSettings, logger: MembershipLogger) =>
      new ProcessCommandRunner({ prefix: settings.commandPrefix, logger: logger.child('command') }));

  const loadSettings = async (options: CommonOptions): Promise<MembershipSettings> => {
    const configuration = new MembershipConfiguration(deps.environment);
    return options.config ? configuration.loadFromFile(options.config) : configuration.getSettings();
  };

  const prepare = async (options: NodeCliOptions & CommonOptions) => {
    const settings = await loadSettings(options);
    const logger = createLogger({ level: settings.logLevel, component: 'fleet-membership' });
    const params = new NodeParams(options, settings, lookup);
    const store = openClusterMeta(params.metadataSource, { logger: logger.child('cluster-meta') });
    const nodesFile = new NodesFile({ realPath: params.persistentPath, canonicalPath: params.canonicalPath });
    return { settings, logger, params, store, nodesFile };
  };

  const program = new Command();
  program
    .name('fleet-membership')
    .description('Coordinate clustered file-server fleet membership')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to a YAML configuration file');

  addNodeOptions(
    program
      .command('set-node')
      .description('Set up the current node in the cluster metadata and nodes files')
      .option('--ip <address>', 'Specify node by IP')
  ).action(async (_options: unknown, command: Command) => {
    const { logger, params, store, nodesFile } = await prepare(command.optsWithGlobals<NodeCliOptions & CommonOptions>());
    const local = await params.localIdentity();
    const outcome = await registerOrRefresh(store, local, { nodesFile, signal: deps.signal });
    logger.info(`${outcome} pnn ${local.pnn} (${local.node}) in ${store.location}`);
  });

  addNodeOptions(
    program
      .command('manage-nodes')
      .description('Monitor the cluster metadata for new nodes and add them to the nodes file')
  ).action(async (_options: unknown, command: Command) => {
    const { settings, logger, params, store, nodesFile } = await prepare(
      command.optsWithGlobals<NodeCliOptions & CommonOptions>()
    );
    const reconciler = new NodesReconciler({
      store,
      nodesFile,
      controller: new CtdbController({
        runner: createRunner(settings, logger),
        reloadCommand: settings.reloadCommand
      }),
      logger: logger.child('reconcile')
    });
    const supervisor = new MembershipSupervisor({
      pnn: params.pnn,
      store,
      reconciler,
      waiter: bestWaiter(params.metadataSource, settings.wait),
      maxConsecutiveFailures: settings.maxConsecutiveFailures,
      logger: logger.child('supervisor')
    });
    await supervisor.run({ signal: deps.signal });
  });

  addNodeOptions(
    program
      .command('must-have-node')
      .description('Block until the current node is present in the nodes file')
  ).action(async (_options: unknown, command: Command) => {
    const { settings, logger, params, store } = await prepare(command.optsWithGlobals<NodeCliOptions & CommonOptions>());
    await waitForAdmission({
      store,
      pnn: params.pnn,
      waiter: bestWaiter(params.metadataSource, settings.wait),
      logger: logger.child('supervisor'),
      signal: deps.signal
    });
    logger.info(`pnn ${params.pnn} is in the nodes file`);
  });

  program
    .command('migrate')
    .description('Migrate standard databases to clustered databases')
    .option('--dest-dir <path>', 'Where clustered database files will be written', DEFAULT_DATABASE_DIR)
    .option('--node-number <n>', 'Node number used to name converted files', parseNodeNumber)
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<MigrateOptions>();
      const settings = await loadSettings(options);
      const logger = createLogger({ level: settings.logLevel, component: 'fleet-membership' });
      const converted = await migrateLegacyDatabases({
        destDir: options.destDir,
        pnn: options.nodeNumber ?? 0,
        runner: createRunner(settings, logger),
        logger: logger.child('migrate')
      });
      logger.info(`converted ${converted.length} database file(s)`);
    });

  return program;
}
