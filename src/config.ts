import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { runConfigSchema, type NameserverSchema } from './schemas/config.schema.js';
import type { NameserverSpec } from './domain/entities/nameserver.entity.js';
import { ConfigError, errorMessage } from './domain/errors.js';

export const DEFAULT_CONFIG_FILE = 'nsconf.yaml';

/** Key given to the nameserver in the single-nameserver configuration shape */
export const SINGLE_NAMESERVER_KEY = 'default';

export interface InfobloxConnection {
  host: string;
  port: number;
  view: string;
  wapiVersion: string;
  username: string;
  password: string;
  pageSize: number;
}

/**
 * Run configuration with both nameserver shapes folded into one ordered list.
 */
export interface RunConfig {
  infoblox: InfobloxConnection;
  nameservers: NameserverSpec[];
}

function toNameserverSpec(key: string, ns: NameserverSchema): NameserverSpec {
  return {
    key,
    hostname: ns.hostname,
    group: ns.group,
    groups: ns.groups,
    format: ns.format,
    path: ns.path,
    outputFile: ns.outputFile,
    masters: Array.isArray(ns.master) ? ns.master : [ns.master],
    tsigKey: ns.tsigKey,
    discoverGroups: ns.discoverGroups,
  };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate an already-parsed configuration document.
 * INFOBLOX_USERNAME and INFOBLOX_PASSWORD override the credentials in the file.
 */
export function parseConfig(
  document: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source?: string
): RunConfig {
  const result = runConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error), source);
  }

  const { infoblox, nameserver, nameservers } = result.data;

  const username = env.INFOBLOX_USERNAME || infoblox.username;
  const password = env.INFOBLOX_PASSWORD || infoblox.password;
  if (!username || !password) {
    throw new ConfigError(
      'infoblox.username and infoblox.password are required (or set INFOBLOX_USERNAME / INFOBLOX_PASSWORD)',
      source
    );
  }

  const specs = nameservers
    ? Object.keys(nameservers)
        .sort()
        .map((key) => toNameserverSpec(key, nameservers[key]))
    : nameserver
      ? [toNameserverSpec(SINGLE_NAMESERVER_KEY, nameserver)]
      : [];

  return {
    infoblox: { ...infoblox, username, password },
    nameservers: specs,
  };
}

/**
 * Load and validate the YAML run configuration.
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): RunConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read configuration: ${errorMessage(error)}`, filePath, { cause: error });
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${errorMessage(error)}`, filePath, { cause: error });
  }

  return parseConfig(document, env, filePath);
}
