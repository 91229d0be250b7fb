/**
 * Build target catalog
 *
 * Loaded once from a YAML file:
 *
 * ```yaml
 * targets:
 *   web:
 *     buildFileRef: docker/web.Dockerfile
 *     tag: registry.example.com/shop/web
 *   nginx:
 *     buildFileRef: docker/nginx.Dockerfile
 *     tag: registry.example.com/shop/nginx
 *     context: docker/nginx
 * ```
 *
 * Key order in the file is catalog order, which serial builds follow.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { RESERVED_TARGET_NAMES } from './defaults';
import { errorMessage, type BuildTarget, type Catalog } from '../domain/types';

/** Target names end up in file names and log fields */
const TARGET_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const targetEntrySchema = z.object({
  buildFileRef: z.string().min(1),
  tag: z.string().min(1),
  context: z.string().min(1).optional(),
  buildArgs: z.record(z.string()).optional(),
});

const catalogFileSchema = z.object({
  targets: z
    .record(targetEntrySchema)
    .refine((targets) => Object.keys(targets).length > 0, 'catalog defines no targets'),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

/**
 * Validate a parsed catalog document
 * @throws ConfigurationError on any schema violation
 */
export function parseCatalog(document: unknown): Catalog {
  const parsed = catalogFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'catalog'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid target catalog: ${issues.join('; ')}`, 'catalog');
  }

  const catalog = new Map<string, BuildTarget>();
  for (const [name, entry] of Object.entries(parsed.data.targets)) {
    if (!TARGET_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(`Invalid target name "${name}" in catalog`, 'catalog', name);
    }
    if (RESERVED_TARGET_NAMES.includes(name.toLowerCase())) {
      throw new ConfigurationError(`Target name "${name}" is reserved for the summary report`, 'catalog', name);
    }
    catalog.set(name, {
      name,
      buildFileRef: entry.buildFileRef,
      tag: entry.tag,
      ...(entry.context ? { context: entry.context } : {}),
      ...(entry.buildArgs ? { buildArgs: entry.buildArgs } : {}),
    });
  }

  return catalog;
}

/**
 * Read and validate the catalog file
 */
export async function loadCatalog(path: string): Promise<Catalog> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read target catalog ${path}: ${errorMessage(error)}`, 'catalogPath', path);
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse target catalog ${path}: ${errorMessage(error)}`, 'catalogPath', path);
  }

  return parseCatalog(document);
}
