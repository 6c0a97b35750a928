import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { Command, CommanderError } from 'commander';
import { ConfigurationError, describeCause } from '../common/errors';
import { DEFAULT_URL_CONFIG, MemberUrlConfig, URL_SCHEMAS, UrlSchema } from '../membership/types';
import { TlsFiles } from '../admin/EtcdAdminClient';

/**
 * Resolved configuration for one bootstrap run
 */
export interface BootstrapperConfig {
  dropInFile: string;
  timeoutMs: number;
  urls: MemberUrlConfig;
  tls: TlsFiles;
  inventoryFile?: string;
  /** Local node name; when absent it is read from instance metadata */
  localName?: string;
  metadataEndpoint: string;
  adminPathPrefix: string;
  verbose: boolean;
}

export type SettingKey =
  | 'dropInFile'
  | 'timeout'
  | 'clientSchema'
  | 'clientPort'
  | 'peerSchema'
  | 'peerPort'
  | 'caFile'
  | 'certFile'
  | 'keyFile'
  | 'inventoryFile'
  | 'name'
  | 'metadataEndpoint'
  | 'adminPathPrefix';

/** One layer of unvalidated settings (file, environment or flags) */
export type RawSettings = Partial<Record<SettingKey, string>>;

interface SettingDefinition {
  key: SettingKey;
  flag: string;
  env: string;
  /** Path inside the YAML config file */
  yamlPath: [string] | [string, string];
  description: string;
}

export const DEFAULT_DROP_IN_FILE = '/var/run/systemd/system/etcd2.service.d/50-etcd-bootstrap.conf';
export const DEFAULT_METADATA_ENDPOINT = 'http://169.254.169.254';

export const SETTINGS: readonly SettingDefinition[] = [
  { key: 'dropInFile', flag: 'drop-in-file', env: 'ETCD_BOOTSTRAP_DROP_IN_FILE', yamlPath: ['drop_in_file'], description: 'The systemd drop-in file to create' },
  { key: 'timeout', flag: 'timeout', env: 'ETCD_BOOTSTRAP_TIMEOUT', yamlPath: ['timeout'], description: 'Timeout for each etcd request (e.g. 5s, 500ms)' },
  { key: 'clientSchema', flag: 'client-schema', env: 'ETCD_BOOTSTRAP_CLIENT_SCHEMA', yamlPath: ['client', 'schema'], description: 'The etcd client schema (http|https)' },
  { key: 'clientPort', flag: 'client-port', env: 'ETCD_BOOTSTRAP_CLIENT_PORT', yamlPath: ['client', 'port'], description: 'The etcd client port' },
  { key: 'peerSchema', flag: 'peer-schema', env: 'ETCD_BOOTSTRAP_PEER_SCHEMA', yamlPath: ['peer', 'schema'], description: 'The etcd peer schema (http|https)' },
  { key: 'peerPort', flag: 'peer-port', env: 'ETCD_BOOTSTRAP_PEER_PORT', yamlPath: ['peer', 'port'], description: 'The etcd peer port' },
  { key: 'caFile', flag: 'ca-file', env: 'ETCD_BOOTSTRAP_CA_FILE', yamlPath: ['tls', 'ca_file'], description: 'Verify HTTPS servers using this CA bundle' },
  { key: 'certFile', flag: 'cert-file', env: 'ETCD_BOOTSTRAP_CERT_FILE', yamlPath: ['tls', 'cert_file'], description: 'Identify the HTTPS client using this certificate' },
  { key: 'keyFile', flag: 'key-file', env: 'ETCD_BOOTSTRAP_KEY_FILE', yamlPath: ['tls', 'key_file'], description: 'Identify the HTTPS client using this key' },
  { key: 'inventoryFile', flag: 'inventory-file', env: 'ETCD_BOOTSTRAP_INVENTORY_FILE', yamlPath: ['inventory_file'], description: 'YAML file listing the expected members' },
  { key: 'name', flag: 'name', env: 'ETCD_BOOTSTRAP_NAME', yamlPath: ['name'], description: 'Local member name (default: EC2 instance id)' },
  { key: 'metadataEndpoint', flag: 'metadata-endpoint', env: 'ETCD_BOOTSTRAP_METADATA_ENDPOINT', yamlPath: ['metadata_endpoint'], description: 'Instance metadata service base URL' },
  { key: 'adminPathPrefix', flag: 'admin-path-prefix', env: 'ETCD_BOOTSTRAP_ADMIN_PATH_PREFIX', yamlPath: ['admin_path_prefix'], description: 'Path prefix of the members API' }
];

export const VERSION = '0.1.0';

export type CommandLine =
  | { kind: 'parsed'; settings: RawSettings; configFile?: string; verbose: boolean }
  /** --help or --version was given; `output` is what commander printed */
  | { kind: 'exit'; output: string };

function buildCommand(out: { text: string }): Command {
  const program = new Command()
    .name('etcd-bootstrapper')
    .description('Reconciles etcd membership against the inventory and writes the initial-cluster drop-in.')
    .version(VERSION)
    .option('-c, --config <file>', 'YAML configuration file [ETCD_BOOTSTRAP_CONFIG]')
    .option('-v, --verbose', 'Print debug output');

  for (const setting of SETTINGS) {
    program.option(`--${setting.flag} <value>`, `${setting.description} [${setting.env}]`);
  }

  return program
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        out.text += text;
      },
      // Parse errors surface as ConfigurationError instead
      writeErr: () => undefined
    });
}

/**
 * Parse command-line flags. Unknown flags are a ConfigurationError.
 */
export function parseCommandLine(argv: string[]): CommandLine {
  const out = { text: '' };
  const program = buildCommand(out);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) {
      return { kind: 'exit', output: out.text.trimEnd() };
    }
    throw new ConfigurationError(describeCause(error), error);
  }

  // Flag names camel-case onto the setting keys (--drop-in-file -> dropInFile)
  const values: Record<string, unknown> = program.opts();
  const settings: RawSettings = {};
  for (const setting of SETTINGS) {
    const value = values[setting.key];
    if (typeof value === 'string') {
      settings[setting.key] = value;
    }
  }

  const configFile = values.config;
  return {
    kind: 'parsed',
    settings,
    configFile: typeof configFile === 'string' ? configFile : undefined,
    verbose: values.verbose === true
  };
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const settings: RawSettings = {};
  for (const setting of SETTINGS) {
    const value = env[setting.env];
    if (value !== undefined && value !== '') {
      settings[setting.key] = value;
    }
  }
  return settings;
}

/**
 * Parse a YAML config document into raw settings (snake_case keys, nested
 * `client`, `peer` and `tls` sections).
 */
export function settingsFromYaml(content: string): RawSettings {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse YAML configuration: ${describeCause(error)}`, error);
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError('YAML configuration must be a mapping');
  }

  const settings: RawSettings = {};
  for (const setting of SETTINGS) {
    const [head, child] = setting.yamlPath;
    let value: unknown = parsed[head];
    if (child !== undefined) {
      value = isRecord(value) ? value[child] : undefined;
    }
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ConfigurationError(`${setting.yamlPath.join('.')} must be a string or number`);
    }
    settings[setting.key] = String(value);
  }
  return settings;
}

export async function loadSettingsFile(filePath: string): Promise<RawSettings> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to load YAML configuration from ${filePath}: ${describeCause(error)}`, error);
  }
  return settingsFromYaml(content);
}

/**
 * Parse `5s`, `500ms`, `1m`, `1.5s` or bare milliseconds
 */
export function parseDuration(value: string): number {
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid duration "${value}"`);
  }
  const amount = Number(match[1]);
  const unit = match[2] ?? 'ms';
  const factor = unit === 'h' ? 3_600_000 : unit === 'm' ? 60_000 : unit === 's' ? 1000 : 1;
  const ms = Math.round(amount * factor);
  if (ms <= 0) {
    throw new ConfigurationError(`Duration must be positive, got "${value}"`);
  }
  return ms;
}

function parsePort(value: string, label: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${label} must be an integer, got "${value}"`);
  }
  const port = Number(value);
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`${label} must be between 1 and 65535, got ${port}`);
  }
  return port;
}

function parseSchema(value: string, label: string): UrlSchema {
  const schema = URL_SCHEMAS.find(candidate => candidate === value);
  if (!schema) {
    throw new ConfigurationError(`${label} must be one of ${URL_SCHEMAS.join(', ')}, got "${value}"`);
  }
  return schema;
}

/**
 * Merge layers (later wins) and validate into a BootstrapperConfig
 */
export function resolveConfig(layers: RawSettings[], verbose = false): BootstrapperConfig {
  const raw = layers.reduce<RawSettings>((merged, layer) => ({ ...merged, ...layer }), {});

  if ((raw.certFile === undefined) !== (raw.keyFile === undefined)) {
    throw new ConfigurationError('cert-file and key-file must be supplied together');
  }

  return {
    dropInFile: raw.dropInFile ?? DEFAULT_DROP_IN_FILE,
    timeoutMs: raw.timeout === undefined ? 5000 : parseDuration(raw.timeout),
    urls: {
      clientSchema: raw.clientSchema === undefined ? DEFAULT_URL_CONFIG.clientSchema : parseSchema(raw.clientSchema, 'client-schema'),
      clientPort: raw.clientPort === undefined ? DEFAULT_URL_CONFIG.clientPort : parsePort(raw.clientPort, 'client-port'),
      peerSchema: raw.peerSchema === undefined ? DEFAULT_URL_CONFIG.peerSchema : parseSchema(raw.peerSchema, 'peer-schema'),
      peerPort: raw.peerPort === undefined ? DEFAULT_URL_CONFIG.peerPort : parsePort(raw.peerPort, 'peer-port')
    },
    tls: {
      caFile: raw.caFile,
      certFile: raw.certFile,
      keyFile: raw.keyFile
    },
    inventoryFile: raw.inventoryFile,
    localName: raw.name,
    metadataEndpoint: raw.metadataEndpoint ?? DEFAULT_METADATA_ENDPOINT,
    adminPathPrefix: raw.adminPathPrefix ?? '/v2',
    verbose
  };
}

export type LoadedCommand =
  | { kind: 'run'; config: BootstrapperConfig }
  | { kind: 'exit'; output: string };

/**
 * Build the configuration with precedence flag > env > file > default.
 * The config file itself comes from `--config` or ETCD_BOOTSTRAP_CONFIG.
 */
export async function loadConfiguration(argv: string[], env: NodeJS.ProcessEnv): Promise<LoadedCommand> {
  const commandLine = parseCommandLine(argv);
  if (commandLine.kind === 'exit') {
    return commandLine;
  }

  const configFile = commandLine.configFile ?? env.ETCD_BOOTSTRAP_CONFIG;
  const fileSettings = configFile ? await loadSettingsFile(configFile) : {};

  const config = resolveConfig(
    [fileSettings, settingsFromEnv(env), commandLine.settings],
    commandLine.verbose
  );
  return { kind: 'run', config };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
