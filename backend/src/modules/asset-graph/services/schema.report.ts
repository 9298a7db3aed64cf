/**
 * SCHEMA REPORT
 *
 * Markdown summary of the graph: statistics, distributions, strongest
 * links, the active rule catalogue and a data-quality score.
 */

import type { GraphMetrics } from '../contracts/asset-graph.types.js';
import { describeRules } from '../rules/relationship.rules.js';
import type { AssetRelationshipGraph } from './asset-graph.service.js';
import { computeMetrics } from './metrics.engine.js';

const HIGH_DENSITY = 0.3;
const BALANCED_DENSITY = 0.1;

const pct = (value: number) => `${(value * 100).toFixed(1)}%`;

/** Average strength plus 0.1 per regulatory event, capped at 1 */
export function dataQualityScore(metrics: GraphMetrics): number {
  return Math.min(1, metrics.averageWeight + metrics.totalEvents / 10);
}

export function densityRecommendation(density: number): string {
  if (density > HIGH_DENSITY) return 'High connectivity - consider normalization';
  if (density > BALANCED_DENSITY) return 'Well-balanced relationship graph - optimal for most use cases';
  return 'Sparse connections - consider adding more relationships';
}

export function generateSchemaReport(graph: AssetRelationshipGraph, topN = 10): string {
  const metrics = computeMetrics(graph.snapshot(), { topN });
  const lines: string[] = [];

  lines.push('# Asset Relationship Schema Report', '');

  lines.push('## Network Statistics', '');
  lines.push(`- **Total Assets**: ${metrics.totalAssets}`);
  lines.push(`- **Regulatory Events**: ${metrics.totalEvents}`);
  lines.push(`- **Total Relationships**: ${metrics.totalRelationships}`);
  lines.push(`- **Average Relationship Strength**: ${metrics.averageWeight.toFixed(3)}`);
  lines.push(`- **Relationship Density**: ${pct(metrics.density)}`, '');

  lines.push('## Relationship Distribution', '');
  for (const [kind, count] of Object.entries(metrics.relationshipDistribution)) {
    if (count > 0) lines.push(`- **${kind}**: ${count}`);
  }
  lines.push('');

  lines.push('## Asset Class Distribution', '');
  for (const [assetClass, count] of Object.entries(metrics.assetClassDistribution)) {
    if (count > 0) lines.push(`- **${assetClass}**: ${count}`);
  }
  lines.push('');

  lines.push('## Top Relationships', '');
  if (metrics.topRelationships.length === 0) {
    lines.push('_No relationships discovered._');
  }
  metrics.topRelationships.forEach((rel, index) => {
    const arrow = rel.bidirectional ? '↔' : '→';
    lines.push(`${index + 1}. ${rel.source} ${arrow} ${rel.target} (${rel.kind}): ${rel.weight.toFixed(2)}`);
  });
  lines.push('');

  lines.push('## Relationship Rules', '');
  lines.push('| Kind | Rule | Direction | Strength |');
  lines.push('|---|---|---|---|');
  for (const rule of describeRules(graph.ruleConfig)) {
    lines.push(`| ${rule.kind} | ${rule.title} | ${rule.direction} | ${rule.strength} |`);
  }
  lines.push('');

  lines.push('## Schema Optimization', '');
  lines.push(`- **Data Quality Score**: ${pct(dataQualityScore(metrics))}`);
  lines.push(`- **Recommendation**: ${densityRecommendation(metrics.density)}`, '');

  lines.push('## Notes', '');
  lines.push('- Relationship strengths are normalized to the 0-1 range');
  lines.push('- Regulatory impact scores are signed in [-1, 1]; edge strength uses the magnitude');

  return lines.join('\n') + '\n';
}
