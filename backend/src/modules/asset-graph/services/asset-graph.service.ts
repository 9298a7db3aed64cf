/**
 * ASSET RELATIONSHIP GRAPH
 * ========================
 *
 * Sole owner of assets, regulatory events and the relationships
 * discovered between them.
 *
 * - Every addition runs the rules against all existing nodes.
 * - Candidate edges are staged and validated before anything is written,
 *   so a failed mutation leaves no trace.
 * - Stored records are frozen; queries hand out fresh arrays.
 */

import { ZodError } from 'zod';
import { resolveRuleConfig } from '../asset-graph.config.js';
import type { RelationshipRuleConfig, RelationshipRuleOverrides } from '../asset-graph.config.js';
import { AssetSchema, RegulatoryEventSchema } from '../contracts/asset-graph.schemas.js';
import {
  DuplicateIdError,
  GraphBusyError,
  InvalidAttributeError,
  InvalidRelationshipError,
  NotFoundError,
} from '../contracts/asset-graph.errors.js';
import type {
  Asset,
  AssetInput,
  GraphSnapshot,
  RegulatoryEvent,
  RegulatoryEventInput,
  Relationship,
  Universe,
} from '../contracts/asset-graph.types.js';
import type { Logger } from '../context/graph.context.js';
import { ASSET_PAIR_RULES, EVENT_RULES } from '../rules/relationship.rules.js';
import type { AssetPairRule, EventRule } from '../rules/relationship.rules.js';
import {
  compareIds,
  compareRelationships,
  deepFreeze,
  otherEndpoint,
  relationshipKey,
} from './graph.ordering.js';

export interface AssetGraphOptions {
  rules?: RelationshipRuleOverrides;
  assetRules?: readonly AssetPairRule[];
  eventRules?: readonly EventRule[];
  logger?: Logger;
}

interface GraphState {
  assets: Map<string, Asset>;
  events: Map<string, RegulatoryEvent>;
  relationships: Map<string, Relationship>;
}

export class AssetRelationshipGraph {
  private readonly assets = new Map<string, Asset>();
  private readonly events = new Map<string, RegulatoryEvent>();
  private readonly relationships = new Map<string, Relationship>();

  private readonly config: RelationshipRuleConfig;
  private readonly assetRules: readonly AssetPairRule[];
  private readonly eventRules: readonly EventRule[];
  private readonly logger?: Logger;

  private _revision = 0;
  private activeOperation: string | null = null;

  constructor(options: AssetGraphOptions = {}) {
    this.config = deepFreeze(resolveRuleConfig(options.rules));
    this.assetRules = options.assetRules ?? ASSET_PAIR_RULES;
    this.eventRules = options.eventRules ?? EVENT_RULES;
    this.logger = options.logger;
  }

  /** Bumped on every successful mutation */
  get revision(): number {
    return this._revision;
  }

  get ruleConfig(): RelationshipRuleConfig {
    return this.config;
  }

  get size(): { assets: number; events: number; relationships: number } {
    return {
      assets: this.assets.size,
      events: this.events.size,
      relationships: this.relationships.size,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // MUTATION
  // ═══════════════════════════════════════════════════════════════

  /**
   * Add one asset and every relationship it forms with existing nodes.
   * @returns number of relationships created
   */
  addAsset(input: AssetInput): number {
    return this.exclusive('addAsset', () => this.insertAsset(input));
  }

  /** All-or-nothing bulk add */
  addAssets(inputs: readonly AssetInput[]): number {
    return this.exclusive('addAssets', () =>
      inputs.reduce((created, input) => created + this.insertAsset(input), 0),
    );
  }

  addEvent(input: RegulatoryEventInput): number {
    return this.exclusive('addEvent', () => this.insertEvent(input));
  }

  addEvents(inputs: readonly RegulatoryEventInput[]): number {
    return this.exclusive('addEvents', () =>
      inputs.reduce((created, input) => created + this.insertEvent(input), 0),
    );
  }

  /**
   * Replace the whole graph with a universe: assets first, then events.
   * On failure the previous contents stay in place.
   */
  load(universe: Universe): number {
    return this.exclusive('load', () => {
      this.reset();
      let created = 0;
      for (const asset of universe.assets) created += this.insertAsset(asset);
      for (const event of universe.events) created += this.insertEvent(event);
      return created;
    });
  }

  /**
   * Remove an asset and every relationship touching it.
   * @returns number of relationships removed
   */
  removeAsset(id: string): number {
    return this.exclusive('removeAsset', () => {
      if (!this.assets.has(id)) throw new NotFoundError('asset', id);
      this.assets.delete(id);
      const removed = this.dropRelationshipsOf(id);
      this.logger?.debug?.('Asset removed', { id, relationshipsRemoved: removed });
      return removed;
    });
  }

  removeEvent(id: string): number {
    return this.exclusive('removeEvent', () => {
      if (!this.events.has(id)) throw new NotFoundError('event', id);
      this.events.delete(id);
      const removed = this.dropRelationshipsOf(id);
      this.logger?.debug?.('Event removed', { id, relationshipsRemoved: removed });
      return removed;
    });
  }

  clear(): void {
    this.exclusive('clear', () => this.reset());
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  hasNode(id: string): boolean {
    return this.assets.has(id) || this.events.has(id);
  }

  getAsset(id: string): Asset {
    const asset = this.assets.get(id);
    if (!asset) throw new NotFoundError('asset', id);
    return asset;
  }

  getEvent(id: string): RegulatoryEvent {
    const event = this.events.get(id);
    if (!event) throw new NotFoundError('event', id);
    return event;
  }

  /** Edges touching `id`, sorted by (kind, other endpoint) */
  getRelationships(id: string): Relationship[] {
    if (!this.hasNode(id)) throw new NotFoundError('node', id);
    return [...this.relationships.values()]
      .filter((rel) => rel.source === id || rel.target === id)
      .sort((a, b) => compareIds(a.kind, b.kind) || compareIds(otherEndpoint(a, id), otherEndpoint(b, id)));
  }

  getNeighbors(id: string): string[] {
    const neighbors = new Set(this.getRelationships(id).map((rel) => otherEndpoint(rel, id)));
    return [...neighbors].sort(compareIds);
  }

  /** Relationship count of a node */
  importance(id: string): number {
    return this.getRelationships(id).length;
  }

  allAssets(): Asset[] {
    return [...this.assets.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  allEvents(): RegulatoryEvent[] {
    return [...this.events.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  allRelationships(): Relationship[] {
    return [...this.relationships.values()].sort(compareRelationships);
  }

  snapshot(): GraphSnapshot {
    return Object.freeze({
      revision: this._revision,
      assets: Object.freeze(this.allAssets()),
      events: Object.freeze(this.allEvents()),
      relationships: Object.freeze(this.allRelationships()),
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private insertAsset(input: AssetInput): number {
    const asset = this.parse('asset', () => AssetSchema.parse(input));
    this.assertIdAvailable(asset.id);

    const staged: Relationship[] = [];
    for (const existing of this.allAssets()) {
      for (const rule of this.assetRules) {
        const match = rule(asset, existing, this.config);
        if (match) staged.push(match);
      }
    }
    for (const event of this.allEvents()) {
      for (const rule of this.eventRules) {
        const match = rule(event, asset, this.config);
        if (match) staged.push(match);
      }
    }

    const created = this.commit(asset.id, staged, () => this.assets.set(asset.id, deepFreeze(asset)));
    this.logger?.debug?.('Asset added', { id: asset.id, assetClass: asset.assetClass, created });
    return created;
  }

  private insertEvent(input: RegulatoryEventInput): number {
    const event = this.parse('regulatory event', () => RegulatoryEventSchema.parse(input));
    this.assertIdAvailable(event.id);

    const staged: Relationship[] = [];
    for (const asset of this.allAssets()) {
      for (const rule of this.eventRules) {
        const match = rule(event, asset, this.config);
        if (match) staged.push(match);
      }
    }

    const created = this.commit(event.id, staged, () => this.events.set(event.id, deepFreeze(event)));
    this.logger?.debug?.('Event added', { id: event.id, eventType: event.eventType, created });
    return created;
  }

  /**
   * Validate every staged edge, then write the node and the edges.
   * Later edges with the same key overwrite earlier ones.
   */
  private commit(newId: string, staged: Relationship[], writeNode: () => void): number {
    const exists = (id: string) => id === newId || this.hasNode(id);
    const byKey = new Map<string, Relationship>();
    for (const rel of staged) {
      this.assertValidRelationship(rel, exists);
      byKey.set(relationshipKey(rel), rel);
    }

    writeNode();
    let created = 0;
    for (const [key, rel] of byKey) {
      if (!this.relationships.has(key)) created += 1;
      this.relationships.set(key, deepFreeze({ ...rel }));
    }
    return created;
  }

  private assertValidRelationship(rel: Relationship, exists: (id: string) => boolean): void {
    const details = { source: rel.source, target: rel.target, kind: rel.kind, weight: rel.weight };
    if (rel.source === rel.target) {
      throw new InvalidRelationshipError('self-loop', details);
    }
    if (!exists(rel.source) || !exists(rel.target)) {
      throw new InvalidRelationshipError('endpoint is not in the graph', details);
    }
    if (!Number.isFinite(rel.weight) || rel.weight <= 0 || rel.weight > 1) {
      throw new InvalidRelationshipError(`weight ${rel.weight} is outside (0, 1]`, details);
    }
  }

  private assertIdAvailable(id: string): void {
    if (this.hasNode(id)) throw new DuplicateIdError(id);
  }

  private parse<T>(subject: string, parse: () => T): T {
    try {
      return parse();
    } catch (err) {
      if (err instanceof ZodError) throw InvalidAttributeError.fromZod(subject, err);
      throw err;
    }
  }

  private dropRelationshipsOf(id: string): number {
    let removed = 0;
    for (const [key, rel] of this.relationships) {
      if (rel.source === id || rel.target === id) {
        this.relationships.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private reset(): void {
    this.assets.clear();
    this.events.clear();
    this.relationships.clear();
  }

  private restore(state: GraphState): void {
    this.reset();
    for (const [id, asset] of state.assets) this.assets.set(id, asset);
    for (const [id, event] of state.events) this.events.set(id, event);
    for (const [key, rel] of state.relationships) this.relationships.set(key, rel);
  }

  /**
   * Single-writer section. Calls are synchronous, so the only way to
   * overlap is re-entry from inside a running mutation (a rule or a
   * logger calling back into the graph).
   * The previous state is restored when `fn` throws.
   */
  private exclusive<T>(operation: string, fn: () => T): T {
    if (this.activeOperation) {
      throw new GraphBusyError(operation, this.activeOperation);
    }
    this.activeOperation = operation;
    const saved: GraphState = {
      assets: new Map(this.assets),
      events: new Map(this.events),
      relationships: new Map(this.relationships),
    };
    try {
      const result = fn();
      this._revision += 1;
      return result;
    } catch (err) {
      this.restore(saved);
      throw err;
    } finally {
      this.activeOperation = null;
    }
  }
}
