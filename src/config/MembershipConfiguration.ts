import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { LogLevel, isLogLevel } from '../common/logger';
import { DEFAULT_RELOAD_COMMAND } from '../control/DaemonController';
import { CANONICAL_NODES_PATH } from '../nodes/NodesFile';
import { DEFAULT_MAX_CONSECUTIVE_FAILURES } from '../supervisor/MembershipSupervisor';
import { DEFAULT_WATCH_TIMEOUT } from '../wait/FileChangeWaiter';
import { WaitStrategy, WaiterConfig } from '../wait/bestWaiter';

export const DEFAULT_METADATA_SOURCE = '/var/lib/ctdb/shared/nodes.json';
export const DEFAULT_NODES_PATH = '/var/lib/ctdb/shared/nodes';

/**
 * Settings resolved from the YAML file, environment overrides and defaults
 */
export interface MembershipSettings {
  /** Cluster metadata location: a path, file: URI, s3://bucket/key or memory: */
  metadataSource: string;
  /** Real (persistent) path of the nodes list */
  nodesPath: string;
  /** Path the clustering daemon reads; a symlink to nodesPath */
  canonicalNodesPath: string;
  maxConsecutiveFailures: number;
  wait: WaiterConfig;
  commandPrefix: string[];
  reloadCommand: string[];
  logLevel: LogLevel;
}

/*
 * YAML layout:
 *
 *   membership:
 *     metadata_source: /var/lib/ctdb/shared/nodes.json
 *     nodes_path: /var/lib/ctdb/shared/nodes
 *     canonical_nodes_path: /etc/ctdb/nodes
 *   supervisor:
 *     max_consecutive_failures: 10
 *     wait: { strategy: auto, interval_ms: 5000, watch_timeout_ms: 300000 }
 *   control:
 *     command_prefix: []
 *     reload_command: [ctdb, reloadnodes]
 *   logging:
 *     level: info
 *   environments:
 *     <name>: { ...any of the sections above }
 */
const SECTIONS = ['membership', 'supervisor', 'control', 'logging'] as const;

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): RawSection {
  const value = raw[name];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`${name} must be a mapping`);
  }
  return value;
}

function optionalString(raw: RawSection, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalInteger(raw: RawSection, key: string, where: string, min: number): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new Error(`${where}.${key} must be an integer >= ${min}`);
  }
  return value;
}

function optionalStringList(raw: RawSection, key: string, where: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === 'string')) {
    throw new Error(`${where}.${key} must be a list of strings`);
  }
  return value.map((item: unknown) => String(item));
}

function isWaitStrategy(value: unknown): value is WaitStrategy {
  return value === 'auto' || value === 'sleep' || value === 'watch';
}

/**
 * YAML configuration loader for the membership commands
 */
export class MembershipConfiguration extends EventEmitter {
  private settings: MembershipSettings = MembershipConfiguration.defaults();
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = process.env.FLEET_MEMBERSHIP_ENV ?? 'production') {
    super();
    this.currentEnvironment = environment;
  }

  static defaults(): MembershipSettings {
    return {
      metadataSource: DEFAULT_METADATA_SOURCE,
      nodesPath: DEFAULT_NODES_PATH,
      canonicalNodesPath: CANONICAL_NODES_PATH,
      maxConsecutiveFailures: DEFAULT_MAX_CONSECUTIVE_FAILURES,
      wait: { strategy: 'auto', watchTimeoutMs: DEFAULT_WATCH_TIMEOUT },
      commandPrefix: [],
      reloadCommand: [...DEFAULT_RELOAD_COMMAND],
      logLevel: 'info'
    };
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<MembershipSettings> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.settings = this.parseFromYaml(yamlContent);
      this.configPath = filePath;
      this.emit('config-loaded', { filePath, settings: this.settings });
      return this.settings;
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load membership configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into settings, applying the current environment's overrides
   */
  parseFromYaml(yamlContent: string): MembershipSettings {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      if (parsed === undefined || parsed === null) {
        return MembershipConfiguration.defaults();
      }
      if (!isRecord(parsed)) {
        throw new Error('top level must be a mapping');
      }
      return this.resolve(this.applyEnvironmentOverrides(parsed));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse membership configuration: ${errorMessage}`);
    }
  }

  getSettings(): MembershipSettings {
    return this.settings;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  /**
   * Merge environment-specific sections over the base sections
   */
  private applyEnvironmentOverrides(raw: Record<string, unknown>): Record<string, unknown> {
    const environments = section(raw, 'environments');
    const overrides = environments[this.currentEnvironment];
    if (overrides === undefined || overrides === null) {
      return raw;
    }
    if (!isRecord(overrides)) {
      throw new Error(`environments.${this.currentEnvironment} must be a mapping`);
    }

    const merged: Record<string, unknown> = { ...raw };
    for (const name of SECTIONS) {
      merged[name] = { ...section(raw, name), ...section(overrides, name) };
    }
    const baseSupervisor = section(raw, 'supervisor');
    const overrideSupervisor = section(overrides, 'supervisor');
    merged.supervisor = {
      ...baseSupervisor,
      ...overrideSupervisor,
      wait: { ...section(baseSupervisor, 'wait'), ...section(overrideSupervisor, 'wait') }
    };
    return merged;
  }

  private resolve(raw: Record<string, unknown>): MembershipSettings {
    const defaults = MembershipConfiguration.defaults();
    const membership = section(raw, 'membership');
    const supervisor = section(raw, 'supervisor');
    const wait = section(supervisor, 'wait');
    const control = section(raw, 'control');
    const logging = section(raw, 'logging');

    const strategy = wait.strategy ?? defaults.wait.strategy;
    if (!isWaitStrategy(strategy)) {
      throw new Error('supervisor.wait.strategy must be one of auto, sleep, watch');
    }
    const level = logging.level ?? defaults.logLevel;
    if (!isLogLevel(level)) {
      throw new Error('logging.level must be one of debug, info, warn, error');
    }
    const reloadCommand = optionalStringList(control, 'reload_command', 'control') ?? defaults.reloadCommand;
    if (reloadCommand.length === 0) {
      throw new Error('control.reload_command must not be empty');
    }

    return {
      metadataSource: optionalString(membership, 'metadata_source', 'membership') ?? defaults.metadataSource,
      nodesPath: optionalString(membership, 'nodes_path', 'membership') ?? defaults.nodesPath,
      canonicalNodesPath: optionalString(membership, 'canonical_nodes_path', 'membership') ?? defaults.canonicalNodesPath,
      maxConsecutiveFailures: optionalInteger(supervisor, 'max_consecutive_failures', 'supervisor', 0)
        ?? defaults.maxConsecutiveFailures,
      wait: {
        strategy,
        intervalMs: optionalInteger(wait, 'interval_ms', 'supervisor.wait', 0),
        watchTimeoutMs: optionalInteger(wait, 'watch_timeout_ms', 'supervisor.wait', 1) ?? defaults.wait.watchTimeoutMs
      },
      commandPrefix: optionalStringList(control, 'command_prefix', 'control') ?? defaults.commandPrefix,
      reloadCommand,
      logLevel: level
    };
  }
}
