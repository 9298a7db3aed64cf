/**
 * LAYOUT GENERATOR
 * ================
 *
 * Deterministic 3D placement for the visualization layer.
 *
 * A node's position depends only on (seed, node id): sha256 of
 * "<seed>:<id>" gives three 32-bit words that pick an azimuth, a polar
 * angle and a radius jitter inside the node class's shell.
 * Insertion order and unrelated nodes never move a node.
 */

import { createHash } from 'crypto';
import { DEFAULT_LAYOUT_CONFIG } from '../asset-graph.config.js';
import type { LayoutConfig } from '../asset-graph.config.js';
import type {
  EdgeLayout,
  GraphLayout,
  GraphSnapshot,
  NodeClass,
  NodeLayout,
  Point3D,
} from '../contracts/asset-graph.types.js';
import { compareIds } from './graph.ordering.js';

export type LayoutOptions = Partial<Omit<LayoutConfig, 'classRadius' | 'classColors' | 'kindColors'>>;

const UINT32_RANGE = 2 ** 32;
const RADIUS_JITTER = 0.3; // ± 15% around the shell radius

function round6(value: number): number {
  const rounded = Math.round(value * 1e6) / 1e6;
  return Object.is(rounded, -0) ? 0 : rounded;
}

/** Three uniform samples in [0, 1) keyed by seed and id */
export function hashUnitTriple(seed: string, id: string): [number, number, number] {
  const digest = createHash('sha256').update(`${seed}:${id}`).digest();
  return [
    digest.readUInt32BE(0) / UINT32_RANGE,
    digest.readUInt32BE(4) / UINT32_RANGE,
    digest.readUInt32BE(8) / UINT32_RANGE,
  ];
}

export function nodePosition(seed: string, id: string, radius: number): Point3D {
  const [u, v, w] = hashUnitTriple(seed, id);
  const azimuth = 2 * Math.PI * u;
  const cosPolar = 2 * v - 1;
  const sinPolar = Math.sqrt(Math.max(0, 1 - cosPolar * cosPolar));
  const r = radius * (1 - RADIUS_JITTER / 2 + RADIUS_JITTER * w);

  return {
    x: round6(r * sinPolar * Math.cos(azimuth)),
    y: round6(r * sinPolar * Math.sin(azimuth)),
    z: round6(r * cosPolar),
  };
}

export function nodeSize(importance: number, config: Pick<LayoutConfig, 'baseSize' | 'sizeStep' | 'maxSize'>): number {
  return Math.min(config.maxSize, config.baseSize + importance * config.sizeStep);
}

interface LayoutNodeSource {
  id: string;
  label: string;
  nodeClass: NodeClass;
}

function collectNodes(snapshot: GraphSnapshot): LayoutNodeSource[] {
  const nodes: LayoutNodeSource[] = [
    ...snapshot.assets.map((a) => ({ id: a.id, label: a.name, nodeClass: a.assetClass })),
    ...snapshot.events.map((e) => ({ id: e.id, label: e.description, nodeClass: 'REGULATORY_EVENT' as const })),
  ];
  return nodes.sort((a, b) => compareIds(a.id, b.id));
}

export function generateLayout(snapshot: GraphSnapshot, options: LayoutOptions = {}): GraphLayout {
  const config: LayoutConfig = {
    ...DEFAULT_LAYOUT_CONFIG,
    seed: options.seed ?? DEFAULT_LAYOUT_CONFIG.seed,
    scale: options.scale ?? DEFAULT_LAYOUT_CONFIG.scale,
    baseSize: options.baseSize ?? DEFAULT_LAYOUT_CONFIG.baseSize,
    sizeStep: options.sizeStep ?? DEFAULT_LAYOUT_CONFIG.sizeStep,
    maxSize: options.maxSize ?? DEFAULT_LAYOUT_CONFIG.maxSize,
  };
  const seed = String(config.seed);

  const importance = new Map<string, number>();
  for (const rel of snapshot.relationships) {
    importance.set(rel.source, (importance.get(rel.source) ?? 0) + 1);
    importance.set(rel.target, (importance.get(rel.target) ?? 0) + 1);
  }

  const positions = new Map<string, Point3D>();
  const nodes: NodeLayout[] = collectNodes(snapshot).map((node) => {
    const position = nodePosition(seed, node.id, config.classRadius[node.nodeClass] * config.scale);
    positions.set(node.id, position);
    const count = importance.get(node.id) ?? 0;
    return {
      id: node.id,
      label: node.label,
      ...position,
      nodeClass: node.nodeClass,
      size: nodeSize(count, config),
      color: config.classColors[node.nodeClass],
      importance: count,
    };
  });

  const edges: EdgeLayout[] = [];
  for (const rel of snapshot.relationships) {
    const sourcePosition = positions.get(rel.source);
    const targetPosition = positions.get(rel.target);
    if (!sourcePosition || !targetPosition) continue;
    edges.push({
      source: rel.source,
      target: rel.target,
      sourcePosition,
      targetPosition,
      weight: rel.weight,
      kind: rel.kind,
      bidirectional: rel.bidirectional,
      color: config.kindColors[rel.kind],
    });
  }

  return { seed, nodes, edges };
}
