/**
 * Resolve Targets Tool
 *
 * Maps a comma-separated selection onto the target catalog.
 */

import type { Logger } from '../../lib/logger';
import { ConfigurationError } from '../../errors';
import { WILDCARD_TOKENS } from '../../config/defaults';
import type { BuildTarget, Catalog } from '../../domain/types';

export interface ResolveTargetsOptions {
  /** Fail on unknown names instead of dropping them */
  strict?: boolean;
}

export function parseSelection(selection: string): string[] {
  return selection
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

const isWildcard = (token: string): boolean => WILDCARD_TOKENS.includes(token.toLowerCase());

/**
 * Resolve a selection such as `web,nginx` or `all`.
 *
 * The wildcard selects the full catalog whatever else is listed. Unknown names
 * are dropped with a warning (or rejected in strict mode). The result follows
 * catalog order and holds each target once.
 *
 * @throws ConfigurationError when nothing is left to build, or on an unknown
 * name in strict mode
 */
export function resolveTargets(
  selection: string,
  catalog: Catalog,
  logger: Logger,
  { strict = false }: ResolveTargetsOptions = {},
): BuildTarget[] {
  const tokens = parseSelection(selection);

  if (tokens.some(isWildcard)) {
    const all = [...catalog.values()];
    logger.info({ targets: all.map((t) => t.name) }, `Selected all ${all.length} catalog targets`);
    return all;
  }

  const unknown = tokens.filter((token) => !catalog.has(token));
  if (unknown.length > 0) {
    if (strict) {
      throw new ConfigurationError(
        `Unknown build target(s): ${unknown.join(', ')}`,
        'targets',
        selection,
        { known: [...catalog.keys()] },
      );
    }
    logger.warn({ unknown, known: [...catalog.keys()] }, `Ignoring unknown target(s): ${unknown.join(', ')}`);
  }

  const selected = new Set(tokens);
  const targets = [...catalog.values()].filter((target) => selected.has(target.name));

  if (targets.length === 0) {
    throw new ConfigurationError(
      `No build targets selected from "${selection}"; nothing to build`,
      'targets',
      selection,
    );
  }

  logger.info({ targets: targets.map((t) => t.name) }, `Selected ${targets.length} target(s)`);
  return targets;
}
