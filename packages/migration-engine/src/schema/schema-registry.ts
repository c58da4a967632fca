/**
 * Schema Registry
 *
 * Resolves a platform identifier to its PlatformSchema. Definitions are read
 * lazily from `<schemaDir>/<platform>.schema.json` (or registered in memory)
 * and cached; a loaded schema never changes.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PlatformSchema } from '@adshift/core';
import { Logger, formatZodIssues, platformSchemaDocumentSchema } from '@adshift/core';
import { MigrationError } from '../errors/index.js';
import { compilePlatformSchema } from './schema-compiler.js';

/** Definitions shipped with the engine (`npm run build` copies them to dist/migration-engine/schemas) */
export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

const SCHEMA_FILE_SUFFIX = '.schema.json';
const PLATFORM_ID_PATTERN = /^[a-z0-9_-]+$/;

export interface SchemaRegistryOptions {
  /** Directory holding `<platform>.schema.json` files */
  schemaDir?: string;
  logger?: Logger;
}

export class SchemaRegistry {
  private readonly schemaDir: string;
  private readonly logger: Logger;
  private readonly schemas = new Map<string, PlatformSchema>();

  constructor(options: SchemaRegistryOptions = {}) {
    this.schemaDir = options.schemaDir ?? DEFAULT_SCHEMA_DIR;
    this.logger = (options.logger ?? new Logger({ level: 'warn' })).child({
      component: 'schema-registry',
    });
  }

  /**
   * Get a platform's schema, loading it on first use
   * @throws MigrationError SCHEMA_NOT_FOUND | SCHEMA_LOAD_ERROR
   */
  get(platform: string): PlatformSchema {
    const cached = this.schemas.get(platform);
    if (cached) {
      return cached;
    }

    const schema = this.loadFromFile(platform);
    this.schemas.set(platform, schema);
    return schema;
  }

  has(platform: string): boolean {
    if (this.schemas.has(platform)) {
      return true;
    }
    const filePath = this.pathFor(platform);
    return filePath !== undefined && existsSync(filePath);
  }

  /**
   * Register a definition document directly, compiling it immediately
   * @throws MigrationError SCHEMA_LOAD_ERROR | CONFIGURATION_ERROR
   */
  register(definition: unknown, source = 'inline definition'): PlatformSchema {
    const schema = this.compile(definition, source);

    if (this.schemas.has(schema.platform)) {
      throw new MigrationError({
        code: 'CONFIGURATION_ERROR',
        message: `Schema for platform '${schema.platform}' is already loaded`,
        suggestion: 'Register each platform definition once.',
      });
    }

    this.schemas.set(schema.platform, schema);
    return schema;
  }

  /**
   * Platforms with a loaded schema or a definition file
   */
  listPlatforms(): string[] {
    const platforms = new Set(this.schemas.keys());

    if (existsSync(this.schemaDir)) {
      for (const file of readdirSync(this.schemaDir)) {
        if (file.endsWith(SCHEMA_FILE_SUFFIX)) {
          platforms.add(file.slice(0, -SCHEMA_FILE_SUFFIX.length));
        }
      }
    }

    return Array.from(platforms).sort();
  }

  /**
   * Load schemas eagerly so malformed definitions fail at startup
   */
  preload(platforms: string[] = this.listPlatforms()): PlatformSchema[] {
    return platforms.map((platform) => this.get(platform));
  }

  private pathFor(platform: string): string | undefined {
    return PLATFORM_ID_PATTERN.test(platform)
      ? join(this.schemaDir, `${platform}${SCHEMA_FILE_SUFFIX}`)
      : undefined;
  }

  private loadFromFile(platform: string): PlatformSchema {
    const filePath = this.pathFor(platform);

    if (!filePath || !existsSync(filePath)) {
      const available = this.listPlatforms();
      throw new MigrationError({
        code: 'SCHEMA_NOT_FOUND',
        message: `No schema definition found for platform '${platform}'`,
        suggestion: `Available platforms: ${available.join(', ') || 'none'}`,
        context: { platform, schemaDir: this.schemaDir },
      });
    }

    let definition: unknown;
    try {
      definition = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MigrationError({
        code: 'SCHEMA_LOAD_ERROR',
        message: `Cannot read schema definition ${filePath}: ${reason}`,
        suggestion: 'Check that the definition file is valid JSON.',
        cause: error instanceof Error ? error : undefined,
        context: { platform, source: filePath },
      });
    }

    const schema = this.compile(definition, filePath);
    if (schema.platform !== platform) {
      throw new MigrationError({
        code: 'SCHEMA_LOAD_ERROR',
        message: `Schema file ${filePath} declares platform '${schema.platform}', expected '${platform}'`,
        suggestion: 'Name definition files after the platform they describe.',
        context: { platform, source: filePath },
      });
    }

    this.logger.debug('Loaded platform schema', {
      platform,
      version: schema.version,
      mappingFields: schema.mapping.length,
      validationFields: schema.validation.size,
    });
    return schema;
  }

  private compile(definition: unknown, source: string): PlatformSchema {
    const parsed = platformSchemaDocumentSchema.safeParse(definition);

    if (!parsed.success) {
      throw new MigrationError({
        code: 'SCHEMA_LOAD_ERROR',
        message: `Invalid schema definition (${source}):\n${formatZodIssues(parsed.error)}`,
        suggestion: 'Fix the listed rules in the schema definition and reload.',
        context: { source },
      });
    }

    return compilePlatformSchema(parsed.data, source);
  }
}
