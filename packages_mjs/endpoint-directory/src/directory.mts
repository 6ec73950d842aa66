/**
 * Endpoint Directory
 *
 * Every `entity.json` below the endpoints directory is one endpoint, named after the
 * directory holding it. Names resolve case-insensitively. `reload` swaps the whole
 * table at once; a failed reload keeps the previous table.
 */
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';
import { EndpointDefinitionError } from './errors.mjs';
import { EntitySchema, formatIssues } from './schema.mjs';
import { buildCompositeDefinition } from './composite.mjs';
import type { EndpointDefinition, EndpointLookup, EndpointType, HttpMethod } from './types.mjs';

export const ENTITY_FILE_NAME = 'entity.json';

/**
 * Directory options
 */
export interface EndpointDirectoryOptions {
  /** Root scanned recursively for entity.json files */
  endpointsDir: string;
  logger?: Logger;
}

/**
 * Summary of one load
 */
export interface LoadSummary {
  endpoints: number;
  composites: number;
  skipped: number;
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function findEntityFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findEntityFiles(fullPath)));
    } else if (entry.isFile() && entry.name.toLowerCase() === ENTITY_FILE_NAME) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Parse one entity.json document into a definition
 *
 * @throws EndpointDefinitionError when the document fails validation
 */
export function parseEndpointDefinition(name: string, document: unknown, source?: string): EndpointDefinition {
  const parsed = EntitySchema.safeParse(document);
  if (!parsed.success) {
    throw new EndpointDefinitionError(`Invalid endpoint "${name}": ${formatIssues(parsed.error)}`, source);
  }

  const entity = parsed.data;
  const type: EndpointType =
    entity.type ?? (entity.compositeConfig !== undefined ? 'composite' : 'standard');
  const compositeConfig =
    type === 'composite' && entity.compositeConfig
      ? buildCompositeDefinition(entity.compositeConfig, name)
      : undefined;

  return Object.freeze({
    name,
    type,
    baseUrl: entity.url.replace(/\/+$/, ''),
    allowedMethods: new Set<HttpMethod>(type === 'composite' ? ['POST'] : entity.methods),
    isPrivate: entity.isPrivate,
    allowedEnvironments:
      entity.allowedEnvironments && entity.allowedEnvironments.length > 0
        ? new Set(entity.allowedEnvironments.map((env) => env.toLowerCase()))
        : 'all',
    cacheDurationSeconds: entity.cacheDurationSeconds,
    compositeConfig,
    source,
  });
}

/**
 * Check a definition's environment restriction
 */
export function isEnvironmentAllowed(definition: EndpointDefinition, environment: string): boolean {
  return definition.allowedEnvironments === 'all' || definition.allowedEnvironments.has(environment.toLowerCase());
}

/**
 * In-memory endpoint table backed by entity.json files
 *
 * @example
 * const directory = new EndpointDirectory({ endpointsDir: './endpoints', logger });
 * await directory.load();
 * const account = directory.lookup('account');
 */
export class EndpointDirectory implements EndpointLookup {
  private readonly options: EndpointDirectoryOptions;
  private readonly logger: Logger;
  private definitions = new Map<string, EndpointDefinition>();

  constructor(options: EndpointDirectoryOptions) {
    this.options = options;
    this.logger = componentLogger('endpoint-directory', options.logger);
  }

  /**
   * Build a directory from definitions already in memory
   */
  static fromDefinitions(definitions: EndpointDefinition[], logger?: Logger): EndpointDirectory {
    const directory = new EndpointDirectory({ endpointsDir: '', logger });
    directory.definitions = directory.index(definitions);
    return directory;
  }

  async load(): Promise<LoadSummary> {
    return this.reload();
  }

  /**
   * Re-scan the endpoints directory and replace the table
   */
  async reload(): Promise<LoadSummary> {
    const { endpointsDir } = this.options;
    const loaded: EndpointDefinition[] = [];
    let skipped = 0;

    let files: string[];
    try {
      files = await findEntityFiles(endpointsDir);
    } catch (error) {
      if (!isMissingPath(error)) {
        throw error;
      }
      this.logger.warn({ endpointsDir }, 'Endpoints directory not found; no endpoints loaded');
      files = [];
    }

    for (const file of files) {
      const name = path.basename(path.dirname(file));
      try {
        const document: unknown = JSON.parse(await readFile(file, 'utf8'));
        loaded.push(parseEndpointDefinition(name, document, file));
      } catch (error) {
        skipped += 1;
        this.logger.error(
          { file, err: error instanceof Error ? error.message : String(error) },
          `Skipping endpoint definition ${name}`
        );
      }
    }

    const next = this.index(loaded);
    this.definitions = next;

    const summary = this.summarize(skipped);
    this.logger.info(summary, 'Endpoint definitions loaded');
    this.warnUnknownTargets();
    return summary;
  }

  lookup(name: string): EndpointDefinition | undefined {
    return this.definitions.get(name.toLowerCase());
  }

  /**
   * Lookup restricted to composite endpoints
   */
  lookupComposite(name: string): EndpointDefinition | undefined {
    const definition = this.lookup(name);
    return definition?.type === 'composite' ? definition : undefined;
  }

  list(): EndpointDefinition[] {
    return [...this.definitions.values()];
  }

  get size(): number {
    return this.definitions.size;
  }

  private index(definitions: EndpointDefinition[]): Map<string, EndpointDefinition> {
    const table = new Map<string, EndpointDefinition>();
    for (const definition of definitions) {
      const key = definition.name.toLowerCase();
      const existing = table.get(key);
      if (existing) {
        this.logger.warn(
          { name: definition.name, source: definition.source, kept: existing.source },
          'Duplicate endpoint name; keeping the first definition'
        );
        continue;
      }
      table.set(key, definition);
    }
    return table;
  }

  private summarize(skipped: number): LoadSummary {
    const composites = this.list().filter((definition) => definition.type === 'composite').length;
    return { endpoints: this.definitions.size - composites, composites, skipped };
  }

  private warnUnknownTargets(): void {
    for (const definition of this.definitions.values()) {
      for (const step of definition.compositeConfig?.steps ?? []) {
        if (!this.definitions.has(step.targetEndpoint.toLowerCase())) {
          this.logger.warn(
            { composite: definition.name, step: step.name, endpoint: step.targetEndpoint },
            'Composite step targets an unknown endpoint'
          );
        }
      }
    }
  }
}
