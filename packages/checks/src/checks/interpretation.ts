/**
 * Interpretation rules
 */

import type { LintFinding, LintRule } from '../types.js';

const VARIANT_CONTEXTS = new Set(['HgncSymbolOrId', 'Hgvs']);

export const interpretationRules: LintRule[] = [
  {
    key: 'variant-without-disease',
    title: 'Variant without disease',
    category: 'INTERPRETATION',
    defaultSeverity: 'WARN',
    rationale: 'A genetic finding is interpreted against a diagnosis recorded in the same block.',
    run: (record) => {
      const findings: LintFinding[] = [];

      for (const [blockId, blocks] of Object.entries(record.blocks)) {
        blocks.forEach((block, index) => {
          const contexts = block.members.map(member => member.context);
          const hasVariant = contexts.some(context => VARIANT_CONTEXTS.has(context));
          if (!hasVariant || contexts.includes('DiseaseLabelOrId')) return;

          findings.push({
            key: 'variant-without-disease',
            title: 'Variant without disease',
            category: 'INTERPRETATION',
            severity: 'WARN',
            subjectId: record.id,
            message: `Block "${blockId}" from ${block.table} row ${block.row} has a variant but no disease`,
            path: `blocks.${blockId}.${index}`,
            fix: { action: 'add', target: 'DiseaseLabelOrId', detail: `add a disease column to block "${blockId}"` },
          });
        });
      }

      return findings;
    },
  },
];
