/**
 * Environment settings
 *
 * `settings.json` at the root lists the environments requests may target;
 * `<env>/settings.json` adds headers sent with every backend call for that
 * environment. `DatabaseName` and `ServerName` headers are always added.
 */
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { formatIssues } from '@apigw/endpoint-directory';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';

const GlobalSettingsSchema = z.object({
  serverName: z.string().min(1).optional(),
  allowedEnvironments: z.array(z.string().trim().min(1)).default([]),
});

const EnvironmentFileSchema = z.object({
  serverName: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
});

export const SETTINGS_FILE_NAME = 'settings.json';

/**
 * Settings of one environment
 */
export interface EnvironmentProfile {
  name: string;
  serverName: string;
  headers: Record<string, string>;
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson(file: string): Promise<unknown | undefined> {
  try {
    return JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    if (isMissingPath(error)) {
      return undefined;
    }
    throw error;
  }
}

export class EnvironmentSettings {
  private readonly profiles: Map<string, EnvironmentProfile>;

  constructor(profiles: EnvironmentProfile[]) {
    this.profiles = new Map(profiles.map((profile) => [profile.name.toLowerCase(), profile]));
  }

  /**
   * Read the environments directory
   *
   * A missing root settings file allows no environment.
   */
  static async load(environmentsDir: string, logger?: Logger): Promise<EnvironmentSettings> {
    const log = componentLogger('environment-settings', logger);
    const rootFile = path.join(environmentsDir, SETTINGS_FILE_NAME);
    const rootDocument = await readJson(rootFile);

    if (rootDocument === undefined) {
      log.warn({ file: rootFile }, 'Environment settings not found; no environments allowed');
      return new EnvironmentSettings([]);
    }

    const root = GlobalSettingsSchema.safeParse(rootDocument);
    if (!root.success) {
      throw new Error(`Invalid ${rootFile}: ${formatIssues(root.error)}`);
    }

    const defaultServer = root.data.serverName ?? 'localhost';
    const profiles: EnvironmentProfile[] = [];

    for (const name of root.data.allowedEnvironments) {
      const file = path.join(environmentsDir, name, SETTINGS_FILE_NAME);
      const document = await readJson(file);
      const parsed = EnvironmentFileSchema.safeParse(document ?? {});
      if (!parsed.success) {
        throw new Error(`Invalid ${file}: ${formatIssues(parsed.error)}`);
      }
      profiles.push({
        name,
        serverName: parsed.data.serverName ?? defaultServer,
        headers: parsed.data.headers,
      });
    }

    log.info({ environments: profiles.map((profile) => profile.name) }, 'Environment settings loaded');
    return new EnvironmentSettings(profiles);
  }

  isAllowed(environment: string): boolean {
    return this.profiles.has(environment.toLowerCase());
  }

  get(environment: string): EnvironmentProfile | undefined {
    return this.profiles.get(environment.toLowerCase());
  }

  /**
   * Headers added to backend calls made for `environment`
   */
  headersFor(environment: string): Record<string, string> {
    const profile = this.get(environment);
    if (!profile) {
      return {};
    }
    return {
      ...profile.headers,
      DatabaseName: profile.name,
      ServerName: profile.serverName,
    };
  }

  list(): string[] {
    return [...this.profiles.values()].map((profile) => profile.name);
  }
}
