/**
 * UNIVERSE LOADER
 *
 * Reads a static asset universe (JSON), validates it and loads it
 * into a graph in one atomic step.
 */

import fs from 'fs';
import path from 'path';
import { UniverseFileSchema } from '../contracts/asset-graph.schemas.js';
import { InvalidAttributeError } from '../contracts/asset-graph.errors.js';
import type { UniverseFile } from '../contracts/asset-graph.types.js';
import type { Logger } from '../context/graph.context.js';
import type { AssetRelationshipGraph } from './asset-graph.service.js';

export interface UniverseLoadResult {
  source: string;
  assets: number;
  events: number;
  relationships: number;
}

export function parseUniverse(raw: unknown, source = 'universe'): UniverseFile {
  const result = UniverseFileSchema.safeParse(raw);
  if (!result.success) {
    throw InvalidAttributeError.fromZod(source, result.error);
  }
  return result.data;
}

export function readUniverseFile(filePath: string): UniverseFile {
  const resolved = path.resolve(filePath);
  const text = fs.readFileSync(resolved, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidAttributeError(`universe file ${resolved}`, [`not valid JSON (${reason})`]);
  }
  return parseUniverse(raw, `universe file ${resolved}`);
}

/** Replace the graph contents with the universe stored at `filePath` */
export function loadUniverseFile(
  graph: AssetRelationshipGraph,
  filePath: string,
  logger?: Logger,
): UniverseLoadResult {
  const universe = readUniverseFile(filePath);
  graph.load(universe);

  const result: UniverseLoadResult = {
    source: path.resolve(filePath),
    assets: universe.assets.length,
    events: universe.events.length,
    relationships: graph.size.relationships,
  };
  logger?.info('Universe loaded', { ...result });
  return result;
}
